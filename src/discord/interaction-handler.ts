import { MessageFlags, PermissionFlagsBits } from 'discord.js';
import type { ChatInputCommandInteraction, Interaction } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { TriggerStore } from '../triggers/store.js';
import type { CallerPermissions } from '../triggers/permission.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { handleTriggerCommand, isTriggerCommandName } from './trigger-commands.js';

export type InteractionHandlerParams = {
  store: TriggerStore;
  log?: LoggerLike;
};

type MemberLike = {
  roles: string[] | { cache: { keys(): Iterable<string> } };
};

export function memberRoleIds(member: MemberLike | null | undefined): Set<string> {
  if (!member) return new Set();
  const roles = member.roles;
  return Array.isArray(roles) ? new Set(roles) : new Set(roles.cache.keys());
}

export function callerPermissions(interaction: Pick<ChatInputCommandInteraction, 'member' | 'memberPermissions'>): CallerPermissions {
  const perms = interaction.memberPermissions;
  return {
    roleIds: memberRoleIds(interaction.member),
    administrator: perms?.has(PermissionFlagsBits.Administrator) ?? false,
    manageGuild: perms?.has(PermissionFlagsBits.ManageGuild) ?? false,
  };
}

export function createInteractionCreateHandler(params: InteractionHandlerParams) {
  return async (interaction: Interaction): Promise<void> => {
    if (!interaction.isChatInputCommand()) return;
    if (!isTriggerCommandName(interaction.commandName)) return;

    try {
      let content: string | null;
      if (!interaction.inGuild()) {
        content = 'Trigger commands only work inside a server.';
      } else {
        content = await handleTriggerCommand(interaction, {
          store: params.store,
          guildId: interaction.guildId,
          caller: callerPermissions(interaction),
          log: params.log,
        });
      }
      if (content === null) return;
      await interaction.reply({ content, flags: MessageFlags.Ephemeral, allowedMentions: NO_MENTIONS });
    } catch (err) {
      params.log?.error(
        { err, command: interaction.commandName, guildId: interaction.guildId },
        'discord:interaction failed',
      );
    }
  };
}
