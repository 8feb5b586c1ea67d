// Entity stores and guild snapshot construction
//
// A snapshot owns its entities in ID-keyed maps. Cross references (a member's
// role IDs, an overwrite's target) stay IDs and are resolved through the
// stores at read time.

import type {
  EntityStore,
  Guild,
  GuildSnapshotData,
  Role,
  Member,
  Channel,
  RoleId,
  UserId,
  ChannelId,
} from '@guildgate/protocol';

/**
 * Index entities by key. When two entities share a key the later one wins.
 */
export function createEntityStore<K, V>(
  entities: Iterable<V>,
  keyOf: (entity: V) => K
): EntityStore<K, V> {
  const store = new Map<K, V>();
  for (const entity of entities) {
    store.set(keyOf(entity), entity);
  }
  return store;
}

function copyMember(member: Member): Member {
  return { ...member, user: { ...member.user }, roles: [...member.roles] };
}

function copyChannel(channel: Channel): Channel {
  return {
    ...channel,
    permissionOverwrites: channel.permissionOverwrites.map((overwrite) => ({
      ...overwrite,
      target: { ...overwrite.target },
    })),
  };
}

/**
 * Build an immutable Guild snapshot from plain data.
 *
 * Entities are copied, so later changes to `data` do not reach the snapshot.
 * The returned object and its stores are never mutated; a newer view of the
 * guild is published by building a new snapshot.
 */
export function createGuildSnapshot(data: GuildSnapshotData): Guild {
  return Object.freeze({
    id: data.id,
    name: data.name,
    ownerId: data.ownerId,
    roles: createEntityStore<RoleId, Role>(
      data.roles.map((role) => ({ ...role })),
      (role) => role.id
    ),
    members: createEntityStore<UserId, Member>(
      data.members.map(copyMember),
      (member) => member.user.id
    ),
    channels: createEntityStore<ChannelId, Channel>(
      data.channels.map(copyChannel),
      (channel) => channel.id
    ),
  });
}

/**
 * Flatten a snapshot back into plain data.
 */
export function snapshotToData(guild: Guild): GuildSnapshotData {
  return {
    id: guild.id,
    name: guild.name,
    ownerId: guild.ownerId,
    roles: [...guild.roles.values()],
    members: [...guild.members.values()],
    channels: [...guild.channels.values()],
  };
}
