// @guildgate/repositories
// Entity stores and guild snapshot repositories.
//
// The engine reads Guild snapshots through the EntityStore contract and never
// writes. Repositories here are how snapshots are built, stored and replaced:
// - in-memory stores for a process that keeps its own cache
// - Postgres (drizzle-orm) for snapshots shared between processes
//
// Code against GuildSnapshotRepository to stay independent of the backend.

export * from './interfaces/index.js';
export * from './in-memory/index.js';
export { databaseConfigFromEnv, type DatabaseConfig } from './config.js';
export * as postgres from './postgres/index.js';
