// ---------------------------------------------------------------------------
// Trigger model
// ---------------------------------------------------------------------------

export const DEFAULT_PHRASE_LIMIT = 100;
/** Keeps command replies that echo the phrase under Discord's message limit. */
export const MAX_PHRASE_LENGTH = 200;
/** Discord's message limit; a longer reply could never be sent. */
export const MAX_RESPONSE_LENGTH = 2000;

export const TRIGGER_TYPES = ['reaction', 'reply'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export type ReactionTrigger = { type: 'reaction'; emoji: string };
export type ReplyTrigger = { type: 'reply'; response: string };

/** One action per phrase: either react with an emoji or reply with text. */
export type Trigger = ReactionTrigger | ReplyTrigger;

export type GuildTriggerConfig = {
  /** Role allowed to manage triggers. `null` falls back to Manage Server. */
  adminRoleId: string | null;
  /** Normalized phrase → action, in insertion order. */
  triggers: Map<string, Trigger>;
};

export function emptyGuildConfig(): GuildTriggerConfig {
  return { adminRoleId: null, triggers: new Map() };
}

export function isTriggerType(value: string): value is TriggerType {
  return value === 'reaction' || value === 'reply';
}

/** Trimmed and lower-cased. Returns null when nothing is left. */
export function normalizePhrase(raw: string): string | null {
  const phrase = String(raw ?? '').trim().toLowerCase();
  return phrase || null;
}

export type BuildTriggerResult =
  | { ok: true; trigger: Trigger }
  | { ok: false; error: string };

/**
 * Build a trigger from loosely-typed command input. The payload that does not
 * belong to the chosen action is ignored.
 */
export function buildTrigger(
  type: TriggerType,
  input: { emoji?: string | null; response?: string | null },
): BuildTriggerResult {
  if (type === 'reaction') {
    const emoji = (input.emoji ?? '').trim();
    if (!emoji) return { ok: false, error: 'You must supply an emoji for a reaction trigger.' };
    return { ok: true, trigger: { type: 'reaction', emoji } };
  }
  const response = input.response ?? '';
  if (!response.trim()) return { ok: false, error: 'You must supply response text for a reply trigger.' };
  if (response.length > MAX_RESPONSE_LENGTH) {
    return { ok: false, error: `Response text must be at most ${MAX_RESPONSE_LENGTH} characters.` };
  }
  return { ok: true, trigger: { type: 'reply', response } };
}
