import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { loadTriggerStore } from '../triggers/store.js';
import type { TriggerStore } from '../triggers/store.js';
import type { CallerPermissions } from '../triggers/permission.js';
import type { Trigger } from '../triggers/types.js';
import {
  NOT_AUTHORIZED_MESSAGE,
  STORAGE_FAILURE_MESSAGE,
  TRIGGER_COMMANDS,
  executeTriggerCommand,
  handleTriggerCommand,
  parseTriggerCommand,
  renderTriggerList,
} from './trigger-commands.js';
import type { CommandInput } from './trigger-commands.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const dirs: string[] = [];

async function makeStore(phraseLimit?: number): Promise<TriggerStore> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trigger-commands-'));
  dirs.push(dir);
  return loadTriggerStore(path.join(dir, 'triggers.json'), { phraseLimit });
}

afterEach(async () => {
  for (const d of dirs) {
    await fs.rm(d, { recursive: true, force: true });
  }
  dirs.length = 0;
});

function input(
  commandName: string,
  opts: { sub?: string; strings?: Record<string, string>; role?: { id: string } } = {},
): CommandInput {
  return {
    commandName,
    options: {
      getSubcommand: () => opts.sub ?? null,
      getString: (name: string) => opts.strings?.[name] ?? null,
      getRole: () => opts.role ?? null,
    },
  };
}

function admin(): CallerPermissions {
  return { roleIds: new Set(), administrator: true, manageGuild: true };
}

function member(roleIds: string[] = [], manageGuild = false): CallerPermissions {
  return { roleIds: new Set(roleIds), administrator: false, manageGuild };
}

function mockLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const skull: Trigger = { type: 'reaction', emoji: '💀' };

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

describe('TRIGGER_COMMANDS', () => {
  it('defines /trigger add|remove|list and /setadminrole', () => {
    expect(TRIGGER_COMMANDS.map((c) => c.name)).toEqual(['trigger', 'setadminrole']);
    expect(TRIGGER_COMMANDS[0]?.options?.map((o) => o.name)).toEqual(['add', 'remove', 'list']);
  });

  it('caps phrase and response lengths', () => {
    expect(TRIGGER_COMMANDS[0]).toMatchObject({
      options: [
        {
          name: 'add',
          options: [
            { name: 'phrase', max_length: 200 },
            { name: 'action' },
            { name: 'emoji' },
            { name: 'response', max_length: 2000 },
          ],
        },
        { name: 'remove', options: [{ name: 'phrase', max_length: 200 }] },
        { name: 'list' },
      ],
    });
  });
});

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

describe('parseTriggerCommand', () => {
  it('parses a reaction trigger with a unicode emoji', () => {
    expect(parseTriggerCommand(input('trigger', {
      sub: 'add',
      strings: { phrase: ' Memento Mori ', action: 'reaction', emoji: '💀' },
    }))).toEqual({ ok: true, command: { action: 'add', phrase: 'memento mori', trigger: skull } });
  });

  it('rejects a phrase longer than 200 characters', () => {
    expect(parseTriggerCommand(input('trigger', {
      sub: 'add',
      strings: { phrase: 'x'.repeat(201), action: 'reaction', emoji: '💀' },
    }))).toEqual({ ok: false, error: 'Phrase must be at most 200 characters.' });
  });

  it('rejects a response longer than a Discord message', () => {
    expect(parseTriggerCommand(input('trigger', {
      sub: 'add',
      strings: { phrase: 'hello', action: 'reply', response: 'y'.repeat(2001) },
    }))).toEqual({ ok: false, error: 'Response text must be at most 2000 characters.' });
  });

  it('parses a reaction trigger with an animated custom emoji', () => {
    expect(parseTriggerCommand(input('trigger', {
      sub: 'add',
      strings: { phrase: 'mm', action: 'reaction', emoji: '<a:MM:1367615846259621908>' },
    }))).toEqual({
      ok: true,
      command: { action: 'add', phrase: 'mm', trigger: { type: 'reaction', emoji: '<a:MM:1367615846259621908>' } },
    });
  });

  it('parses a reply trigger and ignores a stray emoji', () => {
    expect(parseTriggerCommand(input('trigger', {
      sub: 'add',
      strings: { phrase: 'hello', action: 'reply', response: 'Hi there', emoji: '💀' },
    }))).toEqual({ ok: true, command: { action: 'add', phrase: 'hello', trigger: { type: 'reply', response: 'Hi there' } } });
  });

  it('rejects a reaction without an emoji', () => {
    expect(parseTriggerCommand(input('trigger', { sub: 'add', strings: { phrase: 'x', action: 'reaction' } })))
      .toEqual({ ok: false, error: 'You must supply an emoji for a reaction trigger.' });
  });

  it('rejects a reply without a response', () => {
    expect(parseTriggerCommand(input('trigger', { sub: 'add', strings: { phrase: 'x', action: 'reply' } })))
      .toEqual({ ok: false, error: 'You must supply response text for a reply trigger.' });
  });

  it('rejects a blank phrase', () => {
    expect(parseTriggerCommand(input('trigger', { sub: 'add', strings: { phrase: '  ', action: 'reply', response: 'r' } })))
      .toEqual({ ok: false, error: 'Phrase cannot be empty.' });
    expect(parseTriggerCommand(input('trigger', { sub: 'remove', strings: { phrase: '' } })))
      .toEqual({ ok: false, error: 'Phrase cannot be empty.' });
  });

  it('rejects an unknown action', () => {
    expect(parseTriggerCommand(input('trigger', { sub: 'add', strings: { phrase: 'x', action: 'dance' } })))
      .toEqual({ ok: false, error: 'Action must be `reaction` or `reply`.' });
  });

  it('parses remove and list', () => {
    expect(parseTriggerCommand(input('trigger', { sub: 'remove', strings: { phrase: 'HELLO' } })))
      .toEqual({ ok: true, command: { action: 'remove', phrase: 'hello' } });
    expect(parseTriggerCommand(input('trigger', { sub: 'list' })))
      .toEqual({ ok: true, command: { action: 'list' } });
  });

  it('parses setadminrole with and without a role', () => {
    expect(parseTriggerCommand(input('setadminrole', { role: { id: '555' } })))
      .toEqual({ ok: true, command: { action: 'setAdminRole', roleId: '555' } });
    expect(parseTriggerCommand(input('setadminrole')))
      .toEqual({ ok: true, command: { action: 'setAdminRole', roleId: null } });
  });

  it('returns null for commands it does not own', () => {
    expect(parseTriggerCommand(input('ping'))).toBeNull();
    expect(parseTriggerCommand(input('trigger', { sub: 'export' }))).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

describe('renderTriggerList', () => {
  const five = Array.from({ length: 5 }, (_, i): [string, Trigger] => [`p${i}`, { type: 'reply', response: 'r' }]);

  it('reports an empty list', () => {
    expect(renderTriggerList([])).toBe('No triggers set.');
  });

  it('renders one line per trigger in order', () => {
    expect(renderTriggerList([
      ['memento mori', { type: 'reply', response: 'A' }],
      ['mori', skull],
    ])).toBe('• **memento mori** → reply\n• **mori** → reaction');
  });

  it('cuts long output and counts the rest', () => {
    expect(renderTriggerList(five, 50)).toBe('• **p0** → reply\n• **p1** → reply\n…and 3 more');
  });

  it('keeps everything when it fits exactly', () => {
    const out = renderTriggerList(five, 84);
    expect(out.split('\n')).toHaveLength(5);
    expect(out).toHaveLength(84);
  });

  it('stays within the Discord message limit', () => {
    const many = Array.from({ length: 100 }, (_, i): [string, Trigger] => [`${'x'.repeat(100)}${i}`, skull]);
    const out = renderTriggerList(many);
    expect(out.length).toBeLessThanOrEqual(2000);
    expect(out).toMatch(/\n…and \d+ more$/);
  });
});

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

describe('executeTriggerCommand', () => {
  it('adds and lists triggers', async () => {
    const store = await makeStore();
    const ctx = { store, guildId: 'g1', caller: admin() };

    expect(await executeTriggerCommand({ action: 'add', phrase: 'memento mori', trigger: skull }, ctx))
      .toBe('✅ Trigger for ‘memento mori’ set to reaction.');
    expect(await executeTriggerCommand({ action: 'list' }, ctx)).toBe('• **memento mori** → reaction');
  });

  it('escapes markdown in echoed phrases', async () => {
    const store = await makeStore();
    const ctx = { store, guildId: 'g1', caller: admin() };

    expect(await executeTriggerCommand({ action: 'add', phrase: '*hi*', trigger: skull }, ctx))
      .toBe('✅ Trigger for ‘\\*hi\\*’ set to reaction.');
    expect(await executeTriggerCommand({ action: 'remove', phrase: '*hi*' }, ctx))
      .toBe('🗑️ Trigger ‘\\*hi\\*’ removed.');
  });

  it('reports the phrase limit', async () => {
    const store = await makeStore(1);
    const ctx = { store, guildId: 'g1', caller: admin() };
    await executeTriggerCommand({ action: 'add', phrase: 'one', trigger: skull }, ctx);

    expect(await executeTriggerCommand({ action: 'add', phrase: 'two', trigger: skull }, ctx))
      .toBe('Trigger limit (1) reached.');
    expect(store.listTriggers('g1')).toEqual([['one', skull]]);
  });

  it('removes triggers and reports unknown phrases', async () => {
    const store = await makeStore();
    const ctx = { store, guildId: 'g1', caller: admin() };
    await store.upsertTrigger('g1', 'hello', skull);

    expect(await executeTriggerCommand({ action: 'remove', phrase: 'hello' }, ctx)).toBe('🗑️ Trigger ‘hello’ removed.');
    expect(await executeTriggerCommand({ action: 'remove', phrase: 'hello' }, ctx)).toBe('That phrase was not registered.');
  });

  it('sets and clears the admin role', async () => {
    const store = await makeStore();
    const ctx = { store, guildId: 'g1', caller: admin() };

    expect(await executeTriggerCommand({ action: 'setAdminRole', roleId: '555' }, ctx)).toBe('✅ Admin role set to <@&555>.');
    expect(store.get('g1')?.adminRoleId).toBe('555');
    expect(await executeTriggerCommand({ action: 'setAdminRole', roleId: null }, ctx))
      .toBe('✅ Admin role cleared; Manage Server holders can manage triggers.');
    expect(store.get('g1')?.adminRoleId).toBeNull();
  });

  it('reports storage failures instead of throwing', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trigger-commands-'));
    dirs.push(dir);
    await fs.writeFile(path.join(dir, 'blocker'), 'x', 'utf8');
    const store = await loadTriggerStore(path.join(dir, 'blocker', 'triggers.json'));
    const log = mockLog();

    const reply = await executeTriggerCommand(
      { action: 'add', phrase: 'hello', trigger: skull },
      { store, guildId: 'g1', caller: admin(), log },
    );

    expect(reply).toBe(STORAGE_FAILURE_MESSAGE);
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(store.listTriggers('g1')).toEqual([]);
  });
});

describe('handleTriggerCommand', () => {
  it('denies callers without permission before validating input', async () => {
    const store = await makeStore();
    const reply = await handleTriggerCommand(
      input('trigger', { sub: 'add', strings: { phrase: '', action: 'reply' } }),
      { store, guildId: 'g1', caller: member() },
    );
    expect(reply).toBe(NOT_AUTHORIZED_MESSAGE);
  });

  it('lets Manage Server holders in until an admin role is set', async () => {
    const store = await makeStore();
    const manager = member([], true);

    expect(await handleTriggerCommand(input('setadminrole', { role: { id: '555' } }), { store, guildId: 'g1', caller: manager }))
      .toBe('✅ Admin role set to <@&555>.');
    expect(await handleTriggerCommand(input('trigger', { sub: 'list' }), { store, guildId: 'g1', caller: manager }))
      .toBe(NOT_AUTHORIZED_MESSAGE);
    expect(await handleTriggerCommand(input('trigger', { sub: 'list' }), { store, guildId: 'g1', caller: member(['555']) }))
      .toBe('No triggers set.');
  });

  it('returns validation errors to authorized callers', async () => {
    const store = await makeStore();
    const reply = await handleTriggerCommand(
      input('trigger', { sub: 'add', strings: { phrase: 'x', action: 'reaction' } }),
      { store, guildId: 'g1', caller: admin() },
    );
    expect(reply).toBe('You must supply an emoji for a reaction trigger.');
    expect(store.listTriggers('g1')).toEqual([]);
  });

  it('returns null for other commands', async () => {
    const store = await makeStore();
    expect(await handleTriggerCommand(input('ping'), { store, guildId: 'g1', caller: admin() })).toBeNull();
  });
});
