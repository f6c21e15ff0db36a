import fs from 'node:fs/promises';
import path from 'node:path';
import type { LoggerLike } from '../logging/logger-like.js';
import { memberOf, parseJsonDocument, stringifyJsonDocument } from './json-document.js';
import type { JsonNode } from './json-document.js';
import { DEFAULT_PHRASE_LIMIT, emptyGuildConfig, normalizePhrase } from './types.js';
import type { GuildTriggerConfig, Trigger } from './types.js';

// ---------------------------------------------------------------------------
// On-disk format
// ---------------------------------------------------------------------------

export const TRIGGERS_FILENAME = 'triggers.json';

export function resolveTriggersPath(dataDir: string): string {
  return path.join(dataDir, TRIGGERS_FILENAME);
}

function stringMember(node: JsonNode, key: string): string | null {
  const member = memberOf(node, key);
  return member?.kind === 'string' ? member.value : null;
}

function parseStoredTrigger(node: JsonNode): Trigger | null {
  if (node.kind !== 'object') return null;
  const type = stringMember(node, 'type');
  const emoji = stringMember(node, 'emoji');
  const response = stringMember(node, 'response');
  if (type === 'reaction' && emoji?.trim()) return { type: 'reaction', emoji };
  if (type === 'reply' && response?.trim()) return { type: 'reply', response };
  return null;
}

/** Role IDs are stored as bare integers; quoted IDs are accepted too. */
function parseAdminRole(node: JsonNode | undefined): string | null {
  if (node?.kind === 'number' && /^[1-9]\d*$/.test(node.raw)) return node.raw;
  if (node?.kind === 'string' && /^\d+$/.test(node.value)) return node.value;
  return null;
}

function parseGuildEntry(guildId: string, node: JsonNode, log?: LoggerLike): GuildTriggerConfig | null {
  if (node.kind !== 'object') {
    log?.warn({ guildId }, 'triggers:load skipping malformed guild entry');
    return null;
  }
  const config = emptyGuildConfig();
  config.adminRoleId = parseAdminRole(memberOf(node, 'admin_role'));
  const rawTriggers = memberOf(node, 'triggers');
  if (rawTriggers?.kind !== 'object') return config;
  for (const [rawPhrase, rawTrigger] of rawTriggers.entries) {
    const phrase = normalizePhrase(rawPhrase);
    const trigger = parseStoredTrigger(rawTrigger);
    if (!phrase || !trigger) {
      log?.warn({ guildId, phrase: rawPhrase }, 'triggers:load skipping malformed trigger');
      continue;
    }
    if (!config.triggers.has(phrase)) config.triggers.set(phrase, trigger);
  }
  return config;
}

function triggerNode(trigger: Trigger): JsonNode {
  const payload: [string, JsonNode] = trigger.type === 'reaction'
    ? ['emoji', { kind: 'string', value: trigger.emoji }]
    : ['response', { kind: 'string', value: trigger.response }];
  return { kind: 'object', entries: [['type', { kind: 'string', value: trigger.type }], payload] };
}

function adminRoleNode(roleId: string | null): JsonNode {
  if (roleId === null) return { kind: 'null' };
  return /^[1-9]\d*$/.test(roleId) ? { kind: 'number', raw: roleId } : { kind: 'string', value: roleId };
}

/** Members are written in map order; role IDs keep their exact digits. */
function serialize(guilds: ReadonlyMap<string, GuildTriggerConfig>): string {
  const root: JsonNode = {
    kind: 'object',
    entries: [...guilds].map(([guildId, config]): [string, JsonNode] => [guildId, {
      kind: 'object',
      entries: [
        ['admin_role', adminRoleNode(config.adminRoleId)],
        ['triggers', {
          kind: 'object',
          entries: [...config.triggers].map(([phrase, trigger]): [string, JsonNode] => [phrase, triggerNode(trigger)]),
        }],
      ],
    }]),
  };
  return stringifyJsonDocument(root) + '\n';
}

// ---------------------------------------------------------------------------
// Async mutex (one queued job at a time)
// ---------------------------------------------------------------------------

type Job = () => Promise<void>;

export class WriteMutex {
  private queue: Job[] = [];
  private running = false;

  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (err) {
          reject(err);
        }
      });
      if (!this.running) void this.drain();
    });
  }

  private async drain(): Promise<void> {
    this.running = true;
    let job = this.queue.shift();
    while (job) {
      await job();
      job = this.queue.shift();
    }
    this.running = false;
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export type TriggerStoreOptions = {
  /** Maximum phrases per guild. Default: 100. */
  phraseLimit?: number;
  log?: LoggerLike;
};

export type UpsertResult =
  | { ok: true; phrase: string; created: boolean }
  | { ok: false; reason: 'invalid_phrase' }
  | { ok: false; reason: 'capacity_exceeded'; limit: number };

/**
 * Owns every guild's trigger configuration and the JSON file behind it.
 *
 * Mutations run one at a time through a write mutex: the in-memory entry is
 * changed, then the whole store is written to a sibling temp file and renamed
 * over the real one. A failed write rolls the in-memory change back and rethrows.
 */
export class TriggerStore {
  private readonly guilds: Map<string, GuildTriggerConfig>;
  private readonly filePath: string;
  private readonly log: LoggerLike | undefined;
  private readonly mutex = new WriteMutex();
  readonly phraseLimit: number;

  constructor(guilds: Map<string, GuildTriggerConfig>, filePath: string, opts: TriggerStoreOptions = {}) {
    this.guilds = guilds;
    this.filePath = filePath;
    this.phraseLimit = opts.phraseLimit ?? DEFAULT_PHRASE_LIMIT;
    this.log = opts.log;
  }

  get path(): string {
    return this.filePath;
  }

  guildCount(): number {
    return this.guilds.size;
  }

  triggerCount(): number {
    let total = 0;
    for (const config of this.guilds.values()) total += config.triggers.size;
    return total;
  }

  /** Config for a guild, or undefined if the guild has never been configured. */
  get(guildId: string): GuildTriggerConfig | undefined {
    return this.guilds.get(guildId);
  }

  /** Returns the live config, inserting a default one in memory (not persisted). */
  getOrCreate(guildId: string): GuildTriggerConfig {
    let config = this.guilds.get(guildId);
    if (!config) {
      config = emptyGuildConfig();
      this.guilds.set(guildId, config);
    }
    return config;
  }

  listTriggers(guildId: string): Array<[string, Trigger]> {
    const config = this.guilds.get(guildId);
    return config ? [...config.triggers] : [];
  }

  async setAdminRole(guildId: string, roleId: string | null): Promise<void> {
    await this.mutex.run(async () => {
      const config = this.getOrCreate(guildId);
      const prev = config.adminRoleId;
      config.adminRoleId = roleId;
      try {
        await this.flush();
      } catch (err) {
        config.adminRoleId = prev;
        throw err;
      }
    });
    this.log?.info({ guildId, roleId }, 'triggers:admin role set');
  }

  async upsertTrigger(guildId: string, rawPhrase: string, trigger: Trigger): Promise<UpsertResult> {
    const phrase = normalizePhrase(rawPhrase);
    if (!phrase) return { ok: false, reason: 'invalid_phrase' };

    const result = await this.mutex.run(async (): Promise<UpsertResult> => {
      const config = this.getOrCreate(guildId);
      const prev = config.triggers.get(phrase);
      if (!prev && config.triggers.size >= this.phraseLimit) {
        return { ok: false, reason: 'capacity_exceeded', limit: this.phraseLimit };
      }
      config.triggers.set(phrase, trigger);
      try {
        await this.flush();
      } catch (err) {
        if (prev) config.triggers.set(phrase, prev);
        else config.triggers.delete(phrase);
        throw err;
      }
      return { ok: true, phrase, created: !prev };
    });

    if (result.ok) {
      this.log?.info({ guildId, phrase, type: trigger.type, created: result.created }, 'triggers:upsert');
    }
    return result;
  }

  /** Returns false (and writes nothing) when the phrase was not registered. */
  async removeTrigger(guildId: string, rawPhrase: string): Promise<boolean> {
    const phrase = normalizePhrase(rawPhrase);
    if (!phrase) return false;

    const removed = await this.mutex.run(async () => {
      const config = this.guilds.get(guildId);
      const prev = config?.triggers.get(phrase);
      if (!config || !prev) return false;
      // Rebuilt on rollback so the phrase keeps its original scan position.
      const before = new Map(config.triggers);
      config.triggers.delete(phrase);
      try {
        await this.flush();
      } catch (err) {
        config.triggers = before;
        throw err;
      }
      return true;
    });

    if (removed) this.log?.info({ guildId, phrase }, 'triggers:remove');
    return removed;
  }

  /** Persist the whole store. Serialized with every other write. */
  async save(): Promise<void> {
    await this.mutex.run(() => this.flush());
  }

  private async flush(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp.${process.pid}`;
    try {
      await fs.writeFile(tmp, serialize(this.guilds), 'utf8');
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      await fs.unlink(tmp).catch(() => undefined);
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Read the trigger file. A missing file gives an empty store. An unreadable or
 * malformed file is logged and also gives an empty store; the file itself is
 * left in place until the next successful save replaces it.
 */
export async function loadTriggerStore(filePath: string, opts: TriggerStoreOptions = {}): Promise<TriggerStore> {
  const guilds = new Map<string, GuildTriggerConfig>();
  const log = opts.log;

  let raw: string | null = null;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      log?.warn({ err, filePath }, 'triggers:load could not read file; starting fresh');
    }
  }

  if (raw !== null) {
    let parsed: JsonNode | null = null;
    try {
      parsed = parseJsonDocument(raw);
    } catch (err) {
      log?.warn({ err, filePath }, 'triggers:load corrupt JSON; starting fresh');
    }
    if (parsed?.kind === 'object') {
      for (const [guildId, entry] of parsed.entries) {
        const config = parseGuildEntry(guildId, entry, log);
        if (config) guilds.set(guildId, config);
      }
    } else if (parsed) {
      log?.warn({ filePath }, 'triggers:load root is not an object; starting fresh');
    }
  }

  return new TriggerStore(guilds, filePath, opts);
}
