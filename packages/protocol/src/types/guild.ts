// Guild entity types - roles, members, channels and their overwrites

import type { ChannelId, GuildId, RoleId, UserId } from './common.js';
import type { PermissionSet } from './permissions.js';

/**
 * Read-only ID-keyed lookup over owned entities.
 *
 * Entities reference each other by ID and a referenced entity may have been
 * removed since the snapshot was taken, so `get` returning undefined is an
 * ordinary outcome. A `ReadonlyMap` satisfies this contract.
 */
export interface EntityStore<K, V> {
  get(id: K): V | undefined;
  has(id: K): boolean;
  values(): Iterable<V>;
  readonly size: number;
}

/**
 * A guild-scoped capability grant with a ranking.
 */
export type Role = {
  id: RoleId;
  name: string;

  /**
   * Rank within the guild. Higher outranks lower; not unique.
   */
  position: number;

  permissions: PermissionSet;
};

export type User = {
  id: UserId;
  name: string;

  /**
   * Legacy four-digit tag, absent for migrated usernames
   */
  discriminator?: number;
};

export type Member = {
  user: User;

  /**
   * Roles held by the member, excluding @everyone. May reference roles
   * missing from the guild's role store.
   */
  roles: RoleId[];

  /**
   * Guild-specific nickname
   */
  nick?: string;
};

/**
 * Member data that arrives without a guaranteed user object, such as the
 * member embedded in an interaction or message.
 */
export type PartialMember = {
  user?: User;
  roles: RoleId[];
  nick?: string;
};

export type OverwriteTarget =
  | { type: 'role'; roleId: RoleId }
  | { type: 'member'; userId: UserId };

/**
 * Channel-scoped allow/deny delta for a role or a single member.
 * `allow` and `deny` may overlap.
 */
export type PermissionOverwrite = {
  target: OverwriteTarget;
  allow: PermissionSet;
  deny: PermissionSet;
};

export type ChannelKind =
  | 'text'
  | 'voice'
  | 'category'
  | 'announcement'
  | 'stage'
  | 'forum'
  | 'other';

export type Channel = {
  id: ChannelId;
  name: string;
  kind: ChannelKind;
  position: number;
  permissionOverwrites: PermissionOverwrite[];
};

/**
 * One internally consistent view of a guild's entity graph.
 */
export type Guild = {
  id: GuildId;
  name: string;
  ownerId: UserId;
  roles: EntityStore<RoleId, Role>;
  members: EntityStore<UserId, Member>;
  channels: EntityStore<ChannelId, Channel>;
};

/**
 * Plain guild data as accepted by snapshot builders and repositories,
 * before it is indexed into entity stores.
 */
export type GuildSnapshotData = {
  id: GuildId;
  name: string;
  ownerId: UserId;
  roles: Role[];
  members: Member[];
  channels: Channel[];
};
