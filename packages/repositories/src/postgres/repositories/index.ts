// Postgres repository implementations
export { PgGuildSnapshotRepository } from './guild-snapshot-repository.js';
export {
  rowsToSnapshotData,
  snapshotDataToRows,
  type GuildSnapshotRows,
  type GuildRow,
  type RoleRow,
  type MemberRow,
  type MemberRoleRow,
  type ChannelRow,
  type OverwriteRow,
} from './rows.js';
