import { DEFAULT_PHRASE_LIMIT } from './triggers/types.js';

export const DEFAULT_DATA_DIR = '/data';

type ParseResult = {
  config: TriggerBotConfig;
  warnings: string[];
  infos: string[];
};

export type TriggerBotConfig = {
  token: string;
  dataDir: string;
  phraseLimit: number;
  /** Register slash commands on this guild only (instant) instead of globally. */
  commandGuildId?: string;
  syncCommands: boolean;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseSnowflake(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const val = parseTrimmedString(env, name);
  if (val && !/^\d+$/.test(val)) {
    throw new Error(`${name} must be a Discord ID (digits only), got "${val}"`);
  }
  return val;
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = parseTrimmedString(env, 'DISCORD_TOKEN');
  if (!token) {
    throw new Error('Missing DISCORD_TOKEN');
  }

  const explicitDataDir = parseTrimmedString(env, 'TRIGGERS_DATA_DIR');
  const legacyDataDir = parseTrimmedString(env, 'DATA_DIR');
  if (explicitDataDir && legacyDataDir && explicitDataDir !== legacyDataDir) {
    warnings.push(`Both TRIGGERS_DATA_DIR and DATA_DIR are set; using TRIGGERS_DATA_DIR (${explicitDataDir})`);
  }
  const dataDir = explicitDataDir ?? legacyDataDir ?? DEFAULT_DATA_DIR;
  if (!explicitDataDir && !legacyDataDir) {
    infos.push(`TRIGGERS_DATA_DIR not set; storing triggers under ${DEFAULT_DATA_DIR}`);
  }

  const phraseLimit = parsePositiveInt(env, 'TRIGGERS_PHRASE_LIMIT', DEFAULT_PHRASE_LIMIT);
  const commandGuildId = parseSnowflake(env, 'TRIGGERS_GUILD_ID');
  const syncCommands = parseBoolean(env, 'TRIGGERS_SYNC_COMMANDS', true);

  if (!syncCommands && commandGuildId) {
    warnings.push('TRIGGERS_GUILD_ID is ignored because TRIGGERS_SYNC_COMMANDS is off');
  }

  return {
    config: {
      token,
      dataDir,
      phraseLimit,
      commandGuildId,
      syncCommands,
    },
    warnings,
    infos,
  };
}
