export {
  RawRoleSchema,
  RawUserSchema,
  RawMemberSchema,
  RawOverwriteSchema,
  RawChannelSchema,
  RawGuildSnapshotSchema,
  SnapshotValidationError,
  validateGuildSnapshot,
  parseGuildSnapshot,
  type RawGuildSnapshot,
  type SnapshotIssue,
  type SnapshotValidationResult,
} from './snapshot.js';
