// Access Checker
//
// Turns resolved permissions and member hierarchy into allow/deny decisions
// for moderation and administration requests. Decisions are explicit and
// inspectable: a denial carries the missing permissions and a reason.
//
// The checker only decides. Issuing the kick, ban or role edit is left to the
// caller's request layer.

import {
  EMPTY_PERMISSIONS,
  Permissions,
  difference,
  permissionNames,
  type Channel,
  type ChannelId,
  type Guild,
  type PermissionSet,
  type RoleId,
  type UserId,
} from '@guildgate/protocol';
import type { EngineOptions } from '../diagnostics/index.js';
import { resolvePermissions } from '../permissions/index.js';
import { compareHierarchy, memberHighestRole, roleOutranks } from '../hierarchy/index.js';

// --- Types ---

/**
 * Result of an access check
 */
export type AccessCheckResult = {
  /** Whether access is granted */
  allowed: boolean;

  /** The actor's effective permissions where they were resolved */
  granted: PermissionSet;

  /** Required permissions the actor lacks */
  missing: PermissionSet;

  /** Reason for denial (if not allowed) */
  reason?: string;
};

/**
 * Moderation actions and the permission each one requires
 */
export const MODERATION_REQUIREMENTS = {
  kick: Permissions.KICK_MEMBERS,
  ban: Permissions.BAN_MEMBERS,
  timeout: Permissions.MODERATE_MEMBERS,
  edit_nickname: Permissions.MANAGE_NICKNAMES,
  edit_roles: Permissions.MANAGE_ROLES,
} as const satisfies Record<string, PermissionSet>;

export type ModerationAction = keyof typeof MODERATION_REQUIREMENTS;

// --- Access Checker Class ---

/**
 * GuildAccessChecker answers "may this member do that" against one guild
 * snapshot.
 *
 * @example
 * ```typescript
 * const checker = createAccessChecker(guild);
 *
 * const result = checker.checkModeration(moderatorId, targetId, 'ban');
 * if (result.allowed) {
 *   // Proceed with the ban
 * } else {
 *   // Access denied: result.reason
 * }
 * ```
 */
export class GuildAccessChecker {
  constructor(
    private guild: Guild,
    private options: EngineOptions = {}
  ) {}

  /**
   * Check that a member holds every permission in `required`, at guild level
   * or in a channel.
   */
  checkPermissions(
    userId: UserId,
    required: PermissionSet,
    channelId?: ChannelId
  ): AccessCheckResult {
    const member = this.guild.members.get(userId);
    if (!member) {
      return this.deny(required, `User ${userId} is not a member of guild ${this.guild.id}`);
    }

    let channel: Channel | undefined;
    if (channelId !== undefined) {
      channel = this.guild.channels.get(channelId);
      if (!channel) {
        return this.deny(required, `Channel ${channelId} not found in guild ${this.guild.id}`);
      }
    }

    const granted = resolvePermissions(member, this.guild, channel, this.options);
    const missing = difference(required, granted);

    if (missing !== EMPTY_PERMISSIONS) {
      return {
        allowed: false,
        granted,
        missing,
        reason: `Missing permissions: ${permissionNames(missing).join(', ')}`,
      };
    }

    return { allowed: true, granted, missing };
  }

  /**
   * Check that an actor may apply a moderation action to a target.
   *
   * The actor needs the action's permission and must outrank the target.
   */
  checkModeration(
    actorId: UserId,
    targetId: UserId,
    action: ModerationAction
  ): AccessCheckResult {
    const permission = this.checkPermissions(actorId, MODERATION_REQUIREMENTS[action]);
    if (!permission.allowed) {
      return permission;
    }

    if (actorId === targetId) {
      return { ...permission, allowed: false, reason: 'Members cannot moderate themselves' };
    }

    if (!this.guild.members.has(targetId)) {
      return {
        ...permission,
        allowed: false,
        reason: `User ${targetId} is not a member of guild ${this.guild.id}`,
      };
    }

    const higher = compareHierarchy(this.guild, actorId, targetId, this.options);
    if (higher !== actorId) {
      return {
        ...permission,
        allowed: false,
        reason: `Member ${actorId} does not outrank member ${targetId}`,
      };
    }

    return permission;
  }

  /**
   * Check that an actor may edit or assign a role.
   *
   * The actor needs MANAGE_ROLES and, unless they own the guild, a highest
   * role ranked above the role in question.
   */
  canManageRole(actorId: UserId, roleId: RoleId): AccessCheckResult {
    const permission = this.checkPermissions(actorId, Permissions.MANAGE_ROLES);
    if (!permission.allowed) {
      return permission;
    }

    const role = this.guild.roles.get(roleId);
    if (!role) {
      return {
        ...permission,
        allowed: false,
        reason: `Role ${roleId} not found in guild ${this.guild.id}`,
      };
    }

    if (actorId === this.guild.ownerId) {
      return permission;
    }

    const member = this.guild.members.get(actorId);
    const highest = member
      ? memberHighestRole(member, this.guild.roles, this.options)
      : undefined;

    if (!highest || !roleOutranks(highest, role)) {
      return {
        ...permission,
        allowed: false,
        reason: `Role ${roleId} is not below the highest role of member ${actorId}`,
      };
    }

    return permission;
  }

  private deny(required: PermissionSet, reason: string): AccessCheckResult {
    return { allowed: false, granted: EMPTY_PERMISSIONS, missing: required, reason };
  }
}

// --- Factory Function ---

/**
 * Create a GuildAccessChecker for a guild snapshot.
 */
export function createAccessChecker(
  guild: Guild,
  options: EngineOptions = {}
): GuildAccessChecker {
  return new GuildAccessChecker(guild, options);
}
