// Role Hierarchy Resolver
//
// Roles are ranked by position. Positions are not unique; among roles with the
// same position the one with the lower ID (the older role) ranks higher.

import type { EntityStore, Member, Role, RoleId } from '@guildgate/protocol';
import { resolveLogger, type EngineOptions } from '../diagnostics/index.js';

/**
 * Whether role `a` ranks above role `b`.
 */
export function roleOutranks(a: Pick<Role, 'id' | 'position'>, b: Pick<Role, 'id' | 'position'>): boolean {
  return a.position > b.position || (a.position === b.position && a.id < b.id);
}

/**
 * Find the highest-ranked role a member holds.
 *
 * Role IDs that do not resolve in `roles` are skipped. Returns undefined when
 * none of the member's roles resolve.
 */
export function memberHighestRole(
  member: Pick<Member, 'roles'>,
  roles: EntityStore<RoleId, Role>,
  options: EngineOptions = {}
): Role | undefined {
  const logger = resolveLogger(options);
  let highest: Role | undefined;

  for (const roleId of member.roles) {
    const role = roles.get(roleId);
    if (!role) {
      logger.debug('Skipping unresolved role', { roleId: roleId.toString() });
      continue;
    }

    if (!highest || roleOutranks(role, highest)) {
      highest = role;
    }
  }

  return highest;
}

/**
 * How a member places in the hierarchy.
 *
 * - `ranked`: at least one role resolved
 * - `unassigned`: the member holds no roles
 * - `unresolved`: the member holds role IDs, none of which exist any more
 */
export type MemberRank =
  | { kind: 'ranked'; role: Role }
  | { kind: 'unassigned' }
  | { kind: 'unresolved'; missingRoleIds: RoleId[] };

/**
 * Like memberHighestRole, but tells a member who never had a role apart from
 * one whose roles have all been deleted.
 */
export function describeMemberRank(
  member: Pick<Member, 'roles'>,
  roles: EntityStore<RoleId, Role>,
  options: EngineOptions = {}
): MemberRank {
  if (member.roles.length === 0) {
    return { kind: 'unassigned' };
  }

  const role = memberHighestRole(member, roles, options);
  if (role) {
    return { kind: 'ranked', role };
  }

  return { kind: 'unresolved', missingRoleIds: [...member.roles] };
}
