// Access Control module
// Moderation and administration decisions over a guild snapshot.

export {
  // Main class
  GuildAccessChecker,
  createAccessChecker,
  // Types
  type AccessCheckResult,
  type ModerationAction,
  MODERATION_REQUIREMENTS,
} from './checker.js';
