import type { Guild, GuildId, GuildSnapshotData } from '@guildgate/protocol';

/**
 * Repository interface for guild snapshots.
 *
 * A snapshot is only ever replaced as a whole. Readers holding a Guild keep a
 * consistent view for as long as they hold it, regardless of later writes.
 */
export interface GuildSnapshotRepository {
  /**
   * Get the current snapshot of a guild
   * @returns Guild or null if no snapshot is stored
   */
  get(guildId: GuildId): Promise<Guild | null>;

  /**
   * Replace the stored snapshot of a guild with new data
   * @returns The newly published snapshot
   */
  replace(data: GuildSnapshotData): Promise<Guild>;

  /**
   * Remove a guild's snapshot
   * @returns true if a snapshot was removed
   */
  delete(guildId: GuildId): Promise<boolean>;

  /**
   * IDs of all guilds with a stored snapshot
   */
  listGuildIds(): Promise<GuildId[]>;
}
