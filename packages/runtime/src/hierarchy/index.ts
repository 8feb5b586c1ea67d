// Role hierarchy: highest-role resolution and member comparison

export {
  memberHighestRole,
  roleOutranks,
  describeMemberRank,
  type MemberRank,
} from './highest-role.js';
export { compareHierarchy, greaterMemberHierarchy, UNRANKED } from './compare.js';
