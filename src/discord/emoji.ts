import { parseEmoji } from 'discord.js';

export type EmojiInputResult =
  | { ok: true; emoji: string }
  | { ok: false; error: string };

/**
 * Turn the emoji a user typed into something `message.react()` accepts.
 * Unicode input is kept as typed; custom emoji must carry an ID and are
 * rewritten to the canonical `<:name:id>` / `<a:name:id>` form.
 */
export function resolveEmojiInput(raw: string | null | undefined): EmojiInputResult {
  const text = String(raw ?? '').trim();
  if (!text) return { ok: false, error: 'You must supply an emoji for a reaction trigger.' };
  if (!text.startsWith('<')) return { ok: true, emoji: text };

  const parsed = parseEmoji(text);
  if (!parsed?.id || !parsed.name) {
    return { ok: false, error: `\`${text}\` is not a custom emoji. Pick one from the emoji menu or use \`<:name:id>\`.` };
  }
  return { ok: true, emoji: `<${parsed.animated ? 'a' : ''}:${parsed.name}:${parsed.id}>` };
}
