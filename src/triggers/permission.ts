import type { GuildTriggerConfig } from './types.js';

export type CallerPermissions = {
  roleIds: ReadonlySet<string>;
  /** Holds the Administrator permission. */
  administrator: boolean;
  /** Holds the Manage Server permission. */
  manageGuild: boolean;
};

/**
 * Decide whether a caller may change a guild's triggers.
 *
 * Administrator always passes. With an admin role configured, only holders of
 * that role pass (Manage Server alone is not enough). Without one, Manage Server
 * is required. Evaluated fresh on every call.
 */
export function isAuthorized(
  caller: CallerPermissions,
  config: Pick<GuildTriggerConfig, 'adminRoleId'>,
): boolean {
  if (caller.administrator) return true;
  if (config.adminRoleId) return caller.roleIds.has(config.adminRoleId);
  return caller.manageGuild;
}
