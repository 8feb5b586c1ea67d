// Permission resolution entry points
//
// Gather the terms for calculatePermissions from a guild snapshot. Missing
// entities never make resolution fail: a missing @everyone role contributes
// nothing (and is reported), a deleted role held by a member is skipped.

import {
  ALL_PERMISSIONS,
  EMPTY_PERMISSIONS,
  everyoneRoleId,
  type Channel,
  type Guild,
  type Member,
  type PartialMember,
  type PermissionSet,
  type RoleId,
  type UserId,
} from '@guildgate/protocol';
import { resolveLogger, type EngineOptions } from '../diagnostics/index.js';
import { MemberMismatchError } from '../errors.js';
import { calculatePermissions, collectOverwrites } from './calculate.js';

function permissionsFor(
  userId: UserId,
  roleIds: readonly RoleId[],
  guild: Guild,
  channel: Channel | undefined,
  options: EngineOptions
): PermissionSet {
  if (userId === guild.ownerId) {
    return ALL_PERMISSIONS;
  }

  const logger = resolveLogger(options);

  const everyoneRole = guild.roles.get(everyoneRoleId(guild.id));
  if (!everyoneRole) {
    logger.error('@everyone role missing from guild snapshot', {
      guildId: guild.id.toString(),
    });
  }

  let rolePermissions = EMPTY_PERMISSIONS;
  for (const roleId of roleIds) {
    const role = guild.roles.get(roleId);
    if (role) {
      rolePermissions |= role.permissions;
    } else {
      logger.debug('Member holds a role missing from the guild snapshot', {
        guildId: guild.id.toString(),
        userId: userId.toString(),
        roleId: roleId.toString(),
      });
    }
  }

  return calculatePermissions({
    isGuildOwner: false,
    everyonePermissions: everyoneRole?.permissions ?? EMPTY_PERMISSIONS,
    rolePermissions,
    overwrites: channel ? collectOverwrites(channel, guild.id, userId, roleIds) : undefined,
  });
}

/**
 * Compute a member's effective permissions in a guild, or in one of its
 * channels when `channel` is given.
 *
 * Pure and deterministic: the same snapshot and arguments always give the
 * same result.
 */
export function resolvePermissions(
  member: Member,
  guild: Guild,
  channel?: Channel,
  options: EngineOptions = {}
): PermissionSet {
  return permissionsFor(member.user.id, member.roles, guild, channel, options);
}

/**
 * Calculate a member's guild-level permissions.
 */
export function memberPermissions(
  guild: Guild,
  member: Member,
  options: EngineOptions = {}
): PermissionSet {
  return resolvePermissions(member, guild, undefined, options);
}

/**
 * Calculate a member's permissions in a channel.
 */
export function userPermissionsIn(
  guild: Guild,
  channel: Channel,
  member: Member,
  options: EngineOptions = {}
): PermissionSet {
  return resolvePermissions(member, guild, channel, options);
}

/**
 * Calculate a partial member's permissions in a channel.
 *
 * @throws MemberMismatchError if the partial member carries a user whose ID
 *   differs from `memberId`
 */
export function partialMemberPermissionsIn(
  guild: Guild,
  channel: Channel,
  memberId: UserId,
  member: PartialMember,
  options: EngineOptions = {}
): PermissionSet {
  if (member.user && member.user.id !== memberId) {
    throw new MemberMismatchError(memberId, member.user.id);
  }

  return permissionsFor(memberId, member.roles, guild, channel, options);
}
