import type { MessageMentionOptions } from 'discord.js';

/** Allowed-mentions payload that pings nobody. */
export const NO_MENTIONS: MessageMentionOptions = { parse: [] };
