// Permission resolution

export {
  calculatePermissions,
  collectOverwrites,
  type CalculatePermissionsInput,
  type CollectedOverwrites,
  type OverwriteTerms,
} from './calculate.js';
export {
  resolvePermissions,
  memberPermissions,
  userPermissionsIn,
  partialMemberPermissionsIn,
} from './resolve.js';
