// Row mapping between guild snapshot data and the relational schema

import type {
  Channel,
  GuildSnapshotData,
  Member,
  PermissionOverwrite,
  RoleId,
  UserId,
} from '@guildgate/protocol';
import type {
  guilds,
  roles,
  members,
  memberRoles,
  channels,
  permissionOverwrites,
} from '../schema/index.js';

export type GuildRow = typeof guilds.$inferSelect;
export type RoleRow = typeof roles.$inferSelect;
export type MemberRow = typeof members.$inferSelect;
export type MemberRoleRow = typeof memberRoles.$inferSelect;
export type ChannelRow = typeof channels.$inferSelect;
export type OverwriteRow = typeof permissionOverwrites.$inferSelect;

/**
 * Every row belonging to one guild.
 */
export type GuildSnapshotRows = {
  guild: Omit<GuildRow, 'replacedAt'>;
  roles: RoleRow[];
  members: MemberRow[];
  memberRoles: MemberRoleRow[];
  channels: ChannelRow[];
  overwrites: OverwriteRow[];
};

/**
 * Assemble snapshot data from a guild's rows.
 *
 * Member roles keep their row order. Overwrites are ordered by `ordinal`.
 */
export function rowsToSnapshotData(rows: GuildSnapshotRows): GuildSnapshotData {
  const rolesByMember = new Map<UserId, RoleId[]>();
  for (const row of rows.memberRoles) {
    const held = rolesByMember.get(row.userId);
    if (held) {
      held.push(row.roleId);
    } else {
      rolesByMember.set(row.userId, [row.roleId]);
    }
  }

  const overwritesByChannel = new Map<bigint, OverwriteRow[]>();
  for (const row of rows.overwrites) {
    const list = overwritesByChannel.get(row.channelId);
    if (list) {
      list.push(row);
    } else {
      overwritesByChannel.set(row.channelId, [row]);
    }
  }

  return {
    id: rows.guild.id,
    name: rows.guild.name,
    ownerId: rows.guild.ownerId,
    roles: rows.roles.map((row) => ({
      id: row.id,
      name: row.name,
      position: row.position,
      permissions: row.permissions,
    })),
    members: rows.members.map(
      (row): Member => ({
        user: {
          id: row.userId,
          name: row.username,
          ...(row.discriminator !== null ? { discriminator: row.discriminator } : {}),
        },
        roles: rolesByMember.get(row.userId) ?? [],
        ...(row.nick !== null ? { nick: row.nick } : {}),
      })
    ),
    channels: rows.channels.map(
      (row): Channel => ({
        id: row.id,
        name: row.name,
        kind: row.kind,
        position: row.position,
        permissionOverwrites: (overwritesByChannel.get(row.id) ?? [])
          .sort((a, b) => a.ordinal - b.ordinal)
          .map(rowToOverwrite),
      })
    ),
  };
}

function rowToOverwrite(row: OverwriteRow): PermissionOverwrite {
  return {
    target:
      row.targetType === 'role'
        ? { type: 'role', roleId: row.targetId }
        : { type: 'member', userId: row.targetId },
    allow: row.allow,
    deny: row.deny,
  };
}

/**
 * Split snapshot data into rows for insertion.
 */
export function snapshotDataToRows(data: GuildSnapshotData): GuildSnapshotRows {
  return {
    guild: { id: data.id, name: data.name, ownerId: data.ownerId },
    roles: data.roles.map((role) => ({
      id: role.id,
      guildId: data.id,
      name: role.name,
      position: role.position,
      permissions: role.permissions,
    })),
    members: data.members.map((member) => ({
      guildId: data.id,
      userId: member.user.id,
      username: member.user.name,
      discriminator: member.user.discriminator ?? null,
      nick: member.nick ?? null,
    })),
    memberRoles: data.members.flatMap((member) =>
      // a role listed twice would violate the primary key
      [...new Set(member.roles)].map((roleId) => ({
        guildId: data.id,
        userId: member.user.id,
        roleId,
      }))
    ),
    channels: data.channels.map((channel) => ({
      id: channel.id,
      guildId: data.id,
      name: channel.name,
      kind: channel.kind,
      position: channel.position,
    })),
    overwrites: data.channels.flatMap((channel) =>
      channel.permissionOverwrites.map((overwrite, ordinal) => ({
        guildId: data.id,
        channelId: channel.id,
        targetType: overwrite.target.type,
        targetId: overwrite.target.type === 'role' ? overwrite.target.roleId : overwrite.target.userId,
        allow: overwrite.allow,
        deny: overwrite.deny,
        ordinal,
      }))
    ),
  };
}
