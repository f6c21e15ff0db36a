import type { Client } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { TRIGGER_COMMANDS } from './trigger-commands.js';

export type CommandSyncOpts = {
  /** Register on one guild (visible immediately) instead of globally. */
  guildId?: string;
  log?: LoggerLike;
};

/**
 * Push the slash command definitions to Discord. Global registration can take
 * up to an hour to show up in clients.
 */
export async function syncTriggerCommands(client: Client<true>, opts: CommandSyncOpts = {}): Promise<void> {
  const names = TRIGGER_COMMANDS.map((c) => c.name);
  if (opts.guildId) {
    const guild = await client.guilds.fetch(opts.guildId);
    await guild.commands.set(TRIGGER_COMMANDS);
    opts.log?.info({ guildId: opts.guildId, commands: names }, 'discord:commands synced to guild');
    return;
  }
  await client.application.commands.set(TRIGGER_COMMANDS);
  opts.log?.info({ commands: names }, 'discord:commands synced globally');
}
