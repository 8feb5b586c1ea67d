// Member and role lookup by name

import type { Guild, Member, Role } from '@guildgate/protocol';

export type MemberSearchOptions = {
  /** Match case exactly. Defaults to false. */
  caseSensitive?: boolean;

  /**
   * Order results so names where the search term appears earliest, and which
   * are shortest, come first. Defaults to false.
   */
  sorted?: boolean;
};

/**
 * A member matched by a search, with the name that matched
 */
export type MemberMatch = {
  member: Member;
  name: string;
};

/**
 * Find a role by exact name.
 */
export function roleByName(guild: Guild, name: string): Role | undefined {
  for (const role of guild.roles.values()) {
    if (role.name === name) {
      return role;
    }
  }
  return undefined;
}

/**
 * Split "name#1234" into a username and a four-digit discriminator.
 */
export function parseUserTag(tag: string): { name: string; discriminator: number } | undefined {
  const match = /^(.+)#(\d{4})$/.exec(tag);
  if (!match) {
    return undefined;
  }

  const discriminator = Number(match[2]);
  if (discriminator === 0) {
    return undefined;
  }
  return { name: match[1], discriminator };
}

/**
 * Find the first member matching a username, a "username#discriminator"
 * tag, or, failing both, a nickname.
 *
 * The nickname search compares against the full input, "#" and all.
 */
export function memberNamed(guild: Guild, name: string): Member | undefined {
  const tag = parseUserTag(name);
  const username = tag ? tag.name : name;

  for (const member of guild.members.values()) {
    if (
      member.user.name === username &&
      (!tag || member.user.discriminator === tag.discriminator)
    ) {
      return member;
    }
  }

  for (const member of guild.members.values()) {
    if (member.nick === name) {
      return member;
    }
  }

  return undefined;
}

function fold(value: string, caseSensitive: boolean): string {
  return caseSensitive ? value : value.toLowerCase();
}

/**
 * Order names by where the term appears plus their length. Names that do not
 * contain the term sort last.
 */
function closestToOrigin(origin: string, a: string, b: string): number {
  const indexA = a.indexOf(origin);
  if (indexA === -1) return 1;
  const indexB = b.indexOf(origin);
  if (indexB === -1) return -1;

  return indexA + a.length - (indexB + b.length);
}

type NameMatcher = (name: string, term: string) => boolean;

type NameField = 'username' | 'nick' | 'displayName';

function nameOf(member: Member, field: NameField): string | undefined {
  switch (field) {
    case 'username':
      return member.user.name;
    case 'nick':
      return member.nick;
    case 'displayName':
      return member.nick ?? member.user.name;
  }
}

function searchMembers(
  guild: Guild,
  term: string,
  fields: NameField[],
  matches: NameMatcher,
  options: MemberSearchOptions
): MemberMatch[] {
  const { caseSensitive = false, sorted = false } = options;
  const needle = fold(term, caseSensitive);
  const results: MemberMatch[] = [];

  for (const member of guild.members.values()) {
    for (const field of fields) {
      const name = nameOf(member, field);
      if (name !== undefined && matches(fold(name, caseSensitive), needle)) {
        results.push({ member, name });
        break;
      }
    }
  }

  if (sorted) {
    results.sort((a, b) =>
      closestToOrigin(needle, fold(a.name, caseSensitive), fold(b.name, caseSensitive))
    );
  }

  return results;
}

const startsWith: NameMatcher = (name, term) => name.startsWith(term);
const includes: NameMatcher = (name, term) => name.includes(term);

/**
 * Members whose username, or failing that nickname, starts with `prefix`.
 */
export function membersStartingWith(
  guild: Guild,
  prefix: string,
  options: MemberSearchOptions = {}
): MemberMatch[] {
  return searchMembers(guild, prefix, ['username', 'nick'], startsWith, options);
}

/**
 * Members whose username, or failing that nickname, contains `substring`.
 */
export function membersContaining(
  guild: Guild,
  substring: string,
  options: MemberSearchOptions = {}
): MemberMatch[] {
  return searchMembers(guild, substring, ['username', 'nick'], includes, options);
}

export function membersUsernameContaining(
  guild: Guild,
  substring: string,
  options: MemberSearchOptions = {}
): MemberMatch[] {
  return searchMembers(guild, substring, ['username'], includes, options);
}

/**
 * Members whose nickname contains `substring`. Members without a nickname are
 * matched by username.
 */
export function membersNickContaining(
  guild: Guild,
  substring: string,
  options: MemberSearchOptions = {}
): MemberMatch[] {
  return searchMembers(guild, substring, ['displayName'], includes, options);
}
