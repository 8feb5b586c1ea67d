// In-memory entity stores and snapshot repository

export { createEntityStore, createGuildSnapshot, snapshotToData } from './entity-store.js';
export {
  createInMemoryGuildSnapshotRepository,
  type InMemoryGuildSnapshotRepository,
} from './guild-snapshot-repository.js';
