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
} from './search.js';
