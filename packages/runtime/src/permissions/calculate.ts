// Permission Aggregator - the precedence-ordered core
//
// Levels from least to most specific:
//   guild roles → @everyone overwrite → role overwrites → member overwrite
// A more specific level always overrides a less specific one. Within a level
// deny is applied before allow, so a flag both allowed and denied at the same
// level ends up allowed.

import {
  ALL_PERMISSIONS,
  EMPTY_PERMISSIONS,
  Permissions,
  contains,
  everyoneRoleId,
  type Channel,
  type GuildId,
  type PermissionSet,
  type RoleId,
  type UserId,
} from '@guildgate/protocol';

/**
 * An allow/deny pair for one overwrite level
 */
export type OverwriteTerms = {
  allow: PermissionSet;
  deny: PermissionSet;
};

/**
 * The three channel overwrite levels that apply to one member
 */
export type CollectedOverwrites = {
  everyone: OverwriteTerms;

  /** Union of the overwrites of every role the member holds */
  roles: OverwriteTerms;

  member: OverwriteTerms;
};

export type CalculatePermissionsInput = {
  isGuildOwner: boolean;

  /** Permissions of the @everyone role (guild level) */
  everyonePermissions: PermissionSet;

  /** Union of the permissions of the member's resolvable roles (guild level) */
  rolePermissions: PermissionSet;

  /** Channel overwrites; omit for the guild-level result */
  overwrites?: CollectedOverwrites;
};

const NO_OVERWRITE: OverwriteTerms = { allow: EMPTY_PERMISSIONS, deny: EMPTY_PERMISSIONS };

/**
 * Gather the overwrites of a channel that apply to a member.
 *
 * The overwrite targeting the @everyone role (the guild ID) is the everyone
 * level even if `memberRoleIds` lists that ID. Role overwrites for roles the
 * member does not hold are ignored.
 */
export function collectOverwrites(
  channel: Channel,
  guildId: GuildId,
  userId: UserId,
  memberRoleIds: Iterable<RoleId>
): CollectedOverwrites {
  const everyoneId = everyoneRoleId(guildId);
  const held = new Set(memberRoleIds);

  let everyone = NO_OVERWRITE;
  let member = NO_OVERWRITE;
  let roleAllow = EMPTY_PERMISSIONS;
  let roleDeny = EMPTY_PERMISSIONS;

  for (const overwrite of channel.permissionOverwrites) {
    const { target } = overwrite;

    if (target.type === 'member') {
      if (target.userId === userId) {
        member = { allow: overwrite.allow, deny: overwrite.deny };
      }
    } else if (target.roleId === everyoneId) {
      everyone = { allow: overwrite.allow, deny: overwrite.deny };
    } else if (held.has(target.roleId)) {
      roleAllow |= overwrite.allow;
      roleDeny |= overwrite.deny;
    }
  }

  return { everyone, roles: { allow: roleAllow, deny: roleDeny }, member };
}

/**
 * Compute an effective permission set from pre-collected terms.
 *
 * Steps run in this exact order:
 * 1. the guild owner gets every permission
 * 2. start from the @everyone role's permissions
 * 3. add the member's role permissions
 * 4. ADMINISTRATOR grants every permission, ignoring overwrites
 * 5. without overwrites, stop at the guild-level result
 * 6. apply the @everyone overwrite (deny, then allow)
 * 7. apply the union of role overwrites (deny, then allow)
 * 8. apply the member overwrite (deny, then allow)
 */
export function calculatePermissions(input: CalculatePermissionsInput): PermissionSet {
  if (input.isGuildOwner) {
    return ALL_PERMISSIONS;
  }

  let permissions = input.everyonePermissions;
  permissions |= input.rolePermissions;

  if (contains(permissions, Permissions.ADMINISTRATOR)) {
    return ALL_PERMISSIONS;
  }

  const { overwrites } = input;
  if (!overwrites) {
    return permissions;
  }

  permissions &= ~overwrites.everyone.deny;
  permissions |= overwrites.everyone.allow;

  permissions &= ~overwrites.roles.deny;
  permissions |= overwrites.roles.allow;

  permissions &= ~overwrites.member.deny;
  permissions |= overwrites.member.allow;

  return permissions;
}
