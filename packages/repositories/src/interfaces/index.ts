export type { GuildSnapshotRepository } from './guild-snapshot-repository.js';
