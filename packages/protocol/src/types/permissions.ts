// Permission bitsets
//
// A permission set is a bigint where each named flag owns one bit. Bit
// positions match the chat service's documented values so sets read from a
// snapshot can be used as-is.

export type PermissionSet = bigint;

export const Permissions = {
  CREATE_INSTANT_INVITE: 1n << 0n,
  KICK_MEMBERS: 1n << 1n,
  BAN_MEMBERS: 1n << 2n,
  ADMINISTRATOR: 1n << 3n,
  MANAGE_CHANNELS: 1n << 4n,
  MANAGE_GUILD: 1n << 5n,
  ADD_REACTIONS: 1n << 6n,
  VIEW_AUDIT_LOG: 1n << 7n,
  PRIORITY_SPEAKER: 1n << 8n,
  STREAM: 1n << 9n,
  VIEW_CHANNEL: 1n << 10n,
  SEND_MESSAGES: 1n << 11n,
  SEND_TTS_MESSAGES: 1n << 12n,
  MANAGE_MESSAGES: 1n << 13n,
  EMBED_LINKS: 1n << 14n,
  ATTACH_FILES: 1n << 15n,
  READ_MESSAGE_HISTORY: 1n << 16n,
  MENTION_EVERYONE: 1n << 17n,
  USE_EXTERNAL_EMOJIS: 1n << 18n,
  VIEW_GUILD_INSIGHTS: 1n << 19n,
  CONNECT: 1n << 20n,
  SPEAK: 1n << 21n,
  MUTE_MEMBERS: 1n << 22n,
  DEAFEN_MEMBERS: 1n << 23n,
  MOVE_MEMBERS: 1n << 24n,
  USE_VAD: 1n << 25n,
  CHANGE_NICKNAME: 1n << 26n,
  MANAGE_NICKNAMES: 1n << 27n,
  MANAGE_ROLES: 1n << 28n,
  MANAGE_WEBHOOKS: 1n << 29n,
  MANAGE_GUILD_EXPRESSIONS: 1n << 30n,
  USE_APPLICATION_COMMANDS: 1n << 31n,
  REQUEST_TO_SPEAK: 1n << 32n,
  MANAGE_EVENTS: 1n << 33n,
  MANAGE_THREADS: 1n << 34n,
  CREATE_PUBLIC_THREADS: 1n << 35n,
  CREATE_PRIVATE_THREADS: 1n << 36n,
  USE_EXTERNAL_STICKERS: 1n << 37n,
  SEND_MESSAGES_IN_THREADS: 1n << 38n,
  USE_EMBEDDED_ACTIVITIES: 1n << 39n,
  MODERATE_MEMBERS: 1n << 40n,
  VIEW_CREATOR_MONETIZATION_ANALYTICS: 1n << 41n,
  USE_SOUNDBOARD: 1n << 42n,
  CREATE_GUILD_EXPRESSIONS: 1n << 43n,
  CREATE_EVENTS: 1n << 44n,
  USE_EXTERNAL_SOUNDS: 1n << 45n,
  SEND_VOICE_MESSAGES: 1n << 46n,
  SEND_POLLS: 1n << 49n,
  USE_EXTERNAL_APPS: 1n << 50n,
} as const;

export type PermissionName = keyof typeof Permissions;

export function isPermissionName(name: string): name is PermissionName {
  return Object.hasOwn(Permissions, name);
}

const PERMISSION_ENTRIES = Object.entries(Permissions).flatMap(([name, bit]) =>
  isPermissionName(name) ? [[name, bit] as const] : []
);

export const EMPTY_PERMISSIONS: PermissionSet = 0n;

/**
 * Every named flag set.
 */
export const ALL_PERMISSIONS: PermissionSet = PERMISSION_ENTRIES.reduce(
  (set, [, bit]) => set | bit,
  EMPTY_PERMISSIONS
);

export function union(...sets: PermissionSet[]): PermissionSet {
  let result = EMPTY_PERMISSIONS;
  for (const set of sets) {
    result |= set;
  }
  return result;
}

/**
 * Flags in `set` that are not in `remove` (AND-NOT).
 */
export function difference(set: PermissionSet, remove: PermissionSet): PermissionSet {
  return set & ~remove;
}

/**
 * Superset test: whether every flag in `flags` is present in `set`.
 */
export function contains(set: PermissionSet, flags: PermissionSet): boolean {
  return (set & flags) === flags;
}

export function intersects(a: PermissionSet, b: PermissionSet): boolean {
  return (a & b) !== 0n;
}

/**
 * Names of the known flags present in a set, in bit order.
 */
export function permissionNames(set: PermissionSet): PermissionName[] {
  return PERMISSION_ENTRIES.filter(([, bit]) => (set & bit) === bit).map(([name]) => name);
}

/**
 * Parse the decimal string form used on the wire.
 *
 * @returns The set, or undefined when the string is not a non-negative integer
 */
export function parsePermissions(value: string): PermissionSet | undefined {
  if (!/^\d+$/.test(value)) {
    return undefined;
  }
  return BigInt(value);
}

export function serializePermissions(set: PermissionSet): string {
  return set.toString();
}
