import { asc, eq } from 'drizzle-orm';
import type { Guild, GuildId, GuildSnapshotData } from '@guildgate/protocol';
import type { Database } from '../db.js';
import {
  guilds,
  roles,
  members,
  memberRoles,
  channels,
  permissionOverwrites,
} from '../schema/index.js';
import type { GuildSnapshotRepository } from '../../interfaces/index.js';
import { createGuildSnapshot } from '../../in-memory/entity-store.js';
import { rowsToSnapshotData, snapshotDataToRows } from './rows.js';

export class PgGuildSnapshotRepository implements GuildSnapshotRepository {
  constructor(private db: Database) {}

  /**
   * Load a guild's rows inside one read-only, repeatable-read transaction so
   * every table is read from the same committed state.
   */
  async get(guildId: GuildId): Promise<Guild | null> {
    const data = await this.db.transaction(
      async (tx) => {
        const [guild] = await tx.select().from(guilds).where(eq(guilds.id, guildId));
        if (!guild) {
          return null;
        }

        const roleRows = await tx.select().from(roles).where(eq(roles.guildId, guildId));
        const memberRows = await tx.select().from(members).where(eq(members.guildId, guildId));
        const memberRoleRows = await tx
          .select()
          .from(memberRoles)
          .where(eq(memberRoles.guildId, guildId));
        const channelRows = await tx
          .select()
          .from(channels)
          .where(eq(channels.guildId, guildId))
          .orderBy(asc(channels.position), asc(channels.id));
        const overwriteRows = await tx
          .select()
          .from(permissionOverwrites)
          .where(eq(permissionOverwrites.guildId, guildId));

        return rowsToSnapshotData({
          guild,
          roles: roleRows,
          members: memberRows,
          memberRoles: memberRoleRows,
          channels: channelRows,
          overwrites: overwriteRows,
        });
      },
      { isolationLevel: 'repeatable read', accessMode: 'read only' }
    );

    return data ? createGuildSnapshot(data) : null;
  }

  /**
   * Replace all of a guild's rows in a single transaction. Deleting the guild
   * row cascades to every dependent table.
   */
  async replace(data: GuildSnapshotData): Promise<Guild> {
    const rows = snapshotDataToRows(data);

    await this.db.transaction(async (tx) => {
      await tx.delete(guilds).where(eq(guilds.id, data.id));
      await tx.insert(guilds).values(rows.guild);

      if (rows.roles.length > 0) {
        await tx.insert(roles).values(rows.roles);
      }
      if (rows.members.length > 0) {
        await tx.insert(members).values(rows.members);
      }
      if (rows.memberRoles.length > 0) {
        await tx.insert(memberRoles).values(rows.memberRoles);
      }
      if (rows.channels.length > 0) {
        await tx.insert(channels).values(rows.channels);
      }
      if (rows.overwrites.length > 0) {
        await tx.insert(permissionOverwrites).values(rows.overwrites);
      }
    });

    return createGuildSnapshot(data);
  }

  async delete(guildId: GuildId): Promise<boolean> {
    const deleted = await this.db
      .delete(guilds)
      .where(eq(guilds.id, guildId))
      .returning({ id: guilds.id });

    return deleted.length > 0;
  }

  async listGuildIds(): Promise<GuildId[]> {
    const rows = await this.db.select({ id: guilds.id }).from(guilds);
    return rows.map((row) => row.id);
  }
}
