// @guildgate/runtime
// Permission resolution and member hierarchy over guild snapshots

// Permission Aggregator
export {
  resolvePermissions,
  memberPermissions,
  userPermissionsIn,
  partialMemberPermissionsIn,
  calculatePermissions,
  collectOverwrites,
  type CalculatePermissionsInput,
  type CollectedOverwrites,
  type OverwriteTerms,
} from './permissions/index.js';

// Role hierarchy
export {
  memberHighestRole,
  roleOutranks,
  describeMemberRank,
  compareHierarchy,
  greaterMemberHierarchy,
  UNRANKED,
  type MemberRank,
} from './hierarchy/index.js';

// Channels
export { defaultChannel, defaultChannelGuaranteed, sortedChannels } from './channels/index.js';

// Lookup
export {
  roleByName,
  parseUserTag,
  memberNamed,
  membersStartingWith,
  membersContaining,
  membersUsernameContaining,
  membersNickContaining,
  type MemberSearchOptions,
  type MemberMatch,
} from './lookup/index.js';

// Access Control
export {
  GuildAccessChecker,
  createAccessChecker,
  MODERATION_REQUIREMENTS,
  type AccessCheckResult,
  type ModerationAction,
} from './access/index.js';

// Diagnostics
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type DiagnosticLogger,
  type EngineOptions,
  type LogEntry,
} from './diagnostics/index.js';

// Error types
export { RuntimeError, ValidationError, MemberMismatchError } from './errors.js';
