import { SlashCommandBuilder, escapeMarkdown } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { TriggerStore } from '../triggers/store.js';
import { isAuthorized } from '../triggers/permission.js';
import type { CallerPermissions } from '../triggers/permission.js';
import { MAX_PHRASE_LENGTH, MAX_RESPONSE_LENGTH, buildTrigger, isTriggerType, normalizePhrase } from '../triggers/types.js';
import type { Trigger } from '../triggers/types.js';
import { resolveEmojiInput } from './emoji.js';

export const DISCORD_MESSAGE_LIMIT = 2000;

// ---------------------------------------------------------------------------
// Slash command definitions
// ---------------------------------------------------------------------------

const triggerCommand = new SlashCommandBuilder()
  .setName('trigger')
  .setDescription('Trigger management')
  .setDMPermission(false)
  .addSubcommand((sub) => sub
    .setName('add')
    .setDescription('Add or update a trigger phrase → action')
    .addStringOption((opt) => opt
      .setName('phrase')
      .setDescription('Text to watch for (case-insensitive)')
      .setRequired(true)
      .setMaxLength(MAX_PHRASE_LENGTH))
    .addStringOption((opt) => opt
      .setName('action')
      .setDescription('What to do when the phrase appears')
      .setRequired(true)
      .addChoices({ name: 'reaction', value: 'reaction' }, { name: 'reply', value: 'reply' }))
    .addStringOption((opt) => opt.setName('emoji').setDescription('Emoji to react with (reaction only)'))
    .addStringOption((opt) => opt
      .setName('response')
      .setDescription('Text to reply with (reply only)')
      .setMaxLength(MAX_RESPONSE_LENGTH)))
  .addSubcommand((sub) => sub
    .setName('remove')
    .setDescription('Delete a trigger phrase')
    .addStringOption((opt) => opt
      .setName('phrase')
      .setDescription('Phrase to delete')
      .setRequired(true)
      .setMaxLength(MAX_PHRASE_LENGTH)))
  .addSubcommand((sub) => sub
    .setName('list')
    .setDescription('List all trigger phrases in this server'));

const setAdminRoleCommand = new SlashCommandBuilder()
  .setName('setadminrole')
  .setDescription('Choose which role can manage triggers in this server')
  .setDMPermission(false)
  .addRoleOption((opt) => opt.setName('role').setDescription('Role allowed to manage triggers (omit to clear)'));

export const TRIGGER_COMMANDS = [triggerCommand.toJSON(), setAdminRoleCommand.toJSON()];

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TriggerCommand =
  | { action: 'add'; phrase: string; trigger: Trigger }
  | { action: 'remove'; phrase: string }
  | { action: 'list' }
  | { action: 'setAdminRole'; roleId: string | null };

export type ParsedTriggerCommand =
  | { ok: true; command: TriggerCommand }
  | { ok: false; error: string };

/** The slice of a chat-input interaction the parser reads. */
export type CommandInput = {
  commandName: string;
  options: {
    getSubcommand(required: false): string | null;
    getString(name: string): string | null;
    getRole(name: string): { id: string } | null;
  };
};

export type TriggerCommandContext = {
  store: TriggerStore;
  guildId: string;
  caller: CallerPermissions;
  log?: LoggerLike;
};

export const NOT_AUTHORIZED_MESSAGE = 'You are not allowed to manage triggers in this server.';
export const STORAGE_FAILURE_MESSAGE = 'Could not save triggers; try again later.';

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export function isTriggerCommandName(name: string): boolean {
  return name === 'trigger' || name === 'setadminrole';
}

/** Returns null for commands this module does not own. */
export function parseTriggerCommand(input: CommandInput): ParsedTriggerCommand | null {
  if (input.commandName === 'setadminrole') {
    const role = input.options.getRole('role');
    return { ok: true, command: { action: 'setAdminRole', roleId: role?.id ?? null } };
  }
  if (input.commandName !== 'trigger') return null;

  const sub = input.options.getSubcommand(false);
  if (sub === 'list') return { ok: true, command: { action: 'list' } };

  if (sub === 'remove') {
    const phrase = normalizePhrase(input.options.getString('phrase') ?? '');
    if (!phrase) return { ok: false, error: 'Phrase cannot be empty.' };
    return { ok: true, command: { action: 'remove', phrase } };
  }

  if (sub === 'add') {
    const phrase = normalizePhrase(input.options.getString('phrase') ?? '');
    if (!phrase) return { ok: false, error: 'Phrase cannot be empty.' };
    if (phrase.length > MAX_PHRASE_LENGTH) {
      return { ok: false, error: `Phrase must be at most ${MAX_PHRASE_LENGTH} characters.` };
    }

    const action = (input.options.getString('action') ?? '').trim().toLowerCase();
    if (!isTriggerType(action)) return { ok: false, error: 'Action must be `reaction` or `reply`.' };

    let emoji: string | null = null;
    if (action === 'reaction') {
      const resolved = resolveEmojiInput(input.options.getString('emoji'));
      if (!resolved.ok) return resolved;
      emoji = resolved.emoji;
    }
    const built = buildTrigger(action, { emoji, response: input.options.getString('response') });
    if (!built.ok) return built;
    return { ok: true, command: { action: 'add', phrase, trigger: built.trigger } };
  }

  return null;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * One line per trigger, in scan order. Output that would pass the Discord
 * message limit is cut and closed with an "…and N more" line.
 */
export function renderTriggerList(
  entries: ReadonlyArray<readonly [string, Trigger]>,
  limit = DISCORD_MESSAGE_LIMIT,
): string {
  if (entries.length === 0) return 'No triggers set.';

  const lines = entries.map(([phrase, trigger]) => `• **${escapeMarkdown(phrase)}** → ${trigger.type}`);
  const reserve = `\n…and ${lines.length} more`.length;
  const out: string[] = [];
  let used = 0;
  for (const [i, line] of lines.entries()) {
    const cost = (out.length > 0 ? 1 : 0) + line.length;
    const isLast = i === lines.length - 1;
    if (used + cost + (isLast ? 0 : reserve) > limit) {
      out.push(`…and ${lines.length - i} more`);
      break;
    }
    out.push(line);
    used += cost;
  }
  return out.join('\n');
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

export async function executeTriggerCommand(cmd: TriggerCommand, ctx: TriggerCommandContext): Promise<string> {
  const { store, guildId } = ctx;

  if (cmd.action === 'list') {
    return renderTriggerList(store.listTriggers(guildId));
  }

  try {
    if (cmd.action === 'setAdminRole') {
      await store.setAdminRole(guildId, cmd.roleId);
      return cmd.roleId
        ? `✅ Admin role set to <@&${cmd.roleId}>.`
        : '✅ Admin role cleared; Manage Server holders can manage triggers.';
    }

    if (cmd.action === 'remove') {
      const removed = await store.removeTrigger(guildId, cmd.phrase);
      return removed ? `🗑️ Trigger ‘${escapeMarkdown(cmd.phrase)}’ removed.` : 'That phrase was not registered.';
    }

    const result = await store.upsertTrigger(guildId, cmd.phrase, cmd.trigger);
    if (result.ok) return `✅ Trigger for ‘${escapeMarkdown(result.phrase)}’ set to ${cmd.trigger.type}.`;
    if (result.reason === 'capacity_exceeded') return `Trigger limit (${result.limit}) reached.`;
    return 'Phrase cannot be empty.';
  } catch (err) {
    ctx.log?.error({ err, guildId, action: cmd.action }, 'triggers:command failed to persist');
    return STORAGE_FAILURE_MESSAGE;
  }
}

/**
 * Full command path for one invocation: parse, check the caller against the
 * guild's config, then run. Returns null when the command is not ours.
 */
export async function handleTriggerCommand(input: CommandInput, ctx: TriggerCommandContext): Promise<string | null> {
  if (!isTriggerCommandName(input.commandName)) return null;

  const config = ctx.store.getOrCreate(ctx.guildId);
  if (!isAuthorized(ctx.caller, config)) {
    ctx.log?.info({ guildId: ctx.guildId, command: input.commandName }, 'triggers:command denied');
    return NOT_AUTHORIZED_MESSAGE;
  }

  const parsed = parseTriggerCommand(input);
  if (!parsed) return null;
  if (!parsed.ok) return parsed.error;
  return executeTriggerCommand(parsed.command, ctx);
}
