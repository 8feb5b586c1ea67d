// Hierarchy Comparator
//
// Decides which of two members outranks the other, for gating moderation
// actions such as kicks, bans and role edits.

import type { Guild, Role, UserId } from '@guildgate/protocol';
import type { EngineOptions } from '../diagnostics/index.js';
import { memberHighestRole } from './highest-role.js';

/**
 * Rank assigned to a member without any resolvable role. Every real role
 * sorts at or above it.
 */
export const UNRANKED: Pick<Role, 'id' | 'position'> = { id: 1n, position: 0 };

/**
 * Compare two members given their already-resolved highest roles.
 *
 * @returns The user ID of the higher member, or undefined when neither
 *   outranks the other
 */
export function greaterMemberHierarchy(
  lhsRole: Role | undefined,
  rhsRole: Role | undefined,
  ownerId: UserId,
  lhsId: UserId,
  rhsId: UserId
): UserId | undefined {
  if (lhsId === rhsId) {
    return undefined;
  }

  // The owner outranks everyone regardless of roles
  if (lhsId === ownerId) {
    return lhsId;
  }
  if (rhsId === ownerId) {
    return rhsId;
  }

  const lhs = lhsRole ?? UNRANKED;
  const rhs = rhsRole ?? UNRANKED;

  if ((lhs.position === 0 && rhs.position === 0) || lhs.id === rhs.id) {
    return undefined;
  }

  if (lhs.position > rhs.position) {
    return lhsId;
  }
  if (rhs.position > lhs.position) {
    return rhsId;
  }

  // Same position, different roles: the older (lower ID) role wins
  return lhs.id < rhs.id ? lhsId : rhsId;
}

/**
 * Return which of two users ranks higher in a guild.
 *
 * Returns undefined if either user is not a member, if both IDs are the same,
 * or if the two members are tied.
 *
 * @example
 * ```typescript
 * const winner = compareHierarchy(guild, moderatorId, targetId);
 * if (winner === moderatorId) {
 *   // moderator may act on target
 * }
 * ```
 */
export function compareHierarchy(
  guild: Guild,
  userA: UserId,
  userB: UserId,
  options: EngineOptions = {}
): UserId | undefined {
  const lhs = guild.members.get(userA);
  const rhs = guild.members.get(userB);
  if (!lhs || !rhs) {
    return undefined;
  }

  return greaterMemberHierarchy(
    memberHighestRole(lhs, guild.roles, options),
    memberHighestRole(rhs, guild.roles, options),
    guild.ownerId,
    lhs.user.id,
    rhs.user.id
  );
}
