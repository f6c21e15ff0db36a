import { Client, GatewayIntentBits } from 'discord.js';
import type { Guild } from 'discord.js';
import type { LoggerLike } from './logging/logger-like.js';
import type { TriggerStore } from './triggers/store.js';
import { syncTriggerCommands } from './discord/command-sync.js';
import { createInteractionCreateHandler } from './discord/interaction-handler.js';
import { createTriggerMessageHandler } from './discord/trigger-listener.js';

export type BotParams = {
  token: string;
  store: TriggerStore;
  syncCommands: boolean;
  commandGuildId?: string;
  log?: LoggerLike;
};

export async function startTriggerBot(params: BotParams): Promise<Client> {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      // Privileged: also enable "Message Content Intent" in the Developer Portal.
      GatewayIntentBits.MessageContent,
    ],
  });

  client.on('messageCreate', createTriggerMessageHandler({ store: params.store, log: params.log }));
  client.on('interactionCreate', createInteractionCreateHandler({ store: params.store, log: params.log }));
  client.on('guildCreate', (guild: Guild) => {
    params.log?.info({ guildId: guild.id, name: guild.name }, 'discord:guild joined');
  });
  client.on('error', (err) => {
    params.log?.error({ err }, 'discord:client error');
  });

  await client.login(params.token);

  await new Promise<void>((resolve) => {
    if (client.isReady()) {
      resolve();
    } else {
      client.once('ready', () => resolve());
    }
  });

  if (client.isReady()) {
    params.log?.info(
      { user: client.user.tag, userId: client.user.id, guilds: client.guilds.cache.size },
      'discord:ready',
    );
    if (params.syncCommands) {
      try {
        await syncTriggerCommands(client, { guildId: params.commandGuildId, log: params.log });
      } catch (err) {
        params.log?.error({ err, guildId: params.commandGuildId }, 'discord:commands failed to sync');
      }
    }
  }

  return client;
}
