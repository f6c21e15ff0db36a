import type { MessageMentionOptions } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { TriggerStore } from '../triggers/store.js';
import { matchTrigger } from '../triggers/matcher.js';
import type { TriggerMatch } from '../triggers/matcher.js';
import { NO_MENTIONS } from './allowed-mentions.js';

/** The slice of a discord.js Message the listener touches. */
export type TriggerMessage = {
  id: string;
  content: string;
  channelId: string;
  guildId: string | null;
  author: { id: string; bot: boolean };
  react(emoji: string): Promise<unknown>;
  reply(options: { content: string; allowedMentions: MessageMentionOptions }): Promise<unknown>;
};

export type TriggerListenerParams = {
  store: TriggerStore;
  log?: LoggerLike;
};

const MISSING_PERMISSIONS = 50013;

function errorCode(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null;
  return typeof err.code === 'number' ? err.code : null;
}

async function deliverTriggerAction(msg: TriggerMessage, match: TriggerMatch, log?: LoggerLike): Promise<void> {
  const { phrase, trigger } = match;
  const meta = { guildId: msg.guildId, channelId: msg.channelId, messageId: msg.id, phrase, type: trigger.type };
  try {
    if (trigger.type === 'reaction') {
      await msg.react(trigger.emoji);
    } else {
      await msg.reply({ content: trigger.response, allowedMentions: { ...NO_MENTIONS, repliedUser: false } });
    }
    log?.debug?.(meta, 'triggers:fired');
  } catch (err) {
    if (errorCode(err) === MISSING_PERMISSIONS) {
      log?.warn(meta, 'triggers:delivery Missing Permissions (check Add Reactions / Use External Emoji / Send Messages)');
    } else {
      log?.warn({ ...meta, err }, 'triggers:delivery failed');
    }
  }
}

/**
 * messageCreate handler: fires at most one trigger per message. Never throws;
 * a failed reaction or reply is logged and the next message is handled normally.
 */
export function createTriggerMessageHandler(params: TriggerListenerParams) {
  return async (msg: TriggerMessage): Promise<void> => {
    try {
      if (!msg?.author || msg.author.bot) return;
      if (!msg.guildId) return;

      const config = params.store.get(msg.guildId);
      if (!config) return;

      const match = matchTrigger(msg.content, config.triggers);
      if (!match) return;
      await deliverTriggerAction(msg, match, params.log);
    } catch (err) {
      params.log?.error({ err, messageId: msg?.id }, 'triggers:message handler failed');
    }
  };
}
