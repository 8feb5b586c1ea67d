// In-memory guild snapshot repository
//
// Useful for tests, for single-process bots that build snapshots from their
// own gateway cache, and for local development without a database.
// Data does not persist between restarts.

import type { Guild, GuildId, GuildSnapshotData } from '@guildgate/protocol';
import type { GuildSnapshotRepository } from '../interfaces/index.js';
import { createGuildSnapshot } from './entity-store.js';

/**
 * Extended repository with access to the underlying map and a clear function.
 */
export interface InMemoryGuildSnapshotRepository extends GuildSnapshotRepository {
  /** Direct access to the stored snapshots (for debugging/testing) */
  _data: ReadonlyMap<GuildId, Guild>;
  /** Clear all snapshots */
  clear(): void;
}

/**
 * Create an in-memory guild snapshot repository.
 *
 * `replace` builds a complete new Guild and swaps it in with a single map
 * write, so a reader never sees a half-updated guild.
 */
export function createInMemoryGuildSnapshotRepository(
  initial: GuildSnapshotData[] = []
): InMemoryGuildSnapshotRepository {
  const snapshots = new Map<GuildId, Guild>();

  for (const data of initial) {
    snapshots.set(data.id, createGuildSnapshot(data));
  }

  return {
    _data: snapshots,

    async get(guildId: GuildId): Promise<Guild | null> {
      return snapshots.get(guildId) ?? null;
    },

    async replace(data: GuildSnapshotData): Promise<Guild> {
      const guild = createGuildSnapshot(data);
      snapshots.set(guild.id, guild);
      return guild;
    },

    async delete(guildId: GuildId): Promise<boolean> {
      return snapshots.delete(guildId);
    },

    async listGuildIds(): Promise<GuildId[]> {
      return [...snapshots.keys()];
    },

    clear(): void {
      snapshots.clear();
    },
  };
}
