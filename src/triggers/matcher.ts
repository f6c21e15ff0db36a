import type { Trigger } from './types.js';

export type TriggerMatch = { phrase: string; trigger: Trigger };

/**
 * Find the trigger that fires for a message.
 *
 * Phrases are tested in stored order by plain substring containment against the
 * lower-cased text, and the first hit wins. Overlapping phrases resolve to the
 * one registered first, and a phrase can match inside a longer word ("mori" in
 * "memoriam").
 */
export function matchTrigger(
  text: string,
  triggers: ReadonlyMap<string, Trigger>,
): TriggerMatch | null {
  if (triggers.size === 0) return null;
  const content = String(text ?? '').toLowerCase();
  for (const [phrase, trigger] of triggers) {
    if (content.includes(phrase)) return { phrase, trigger };
  }
  return null;
}
