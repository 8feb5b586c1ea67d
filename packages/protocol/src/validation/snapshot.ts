// Snapshot Validation
//
// Validates raw guild snapshots (decimal-string IDs and permission sets, the
// shape the chat service's JSON uses) and normalizes them into
// GuildSnapshotData.

import { z } from 'zod';
import type {
  Channel,
  ChannelKind,
  GuildSnapshotData,
  Member,
  PermissionOverwrite,
  Role,
} from '../types/guild.js';

// Largest value a signed 64-bit integer column holds
const MAX_INT64 = (1n << 63n) - 1n;

const SnowflakeSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal snowflake')
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_INT64, 'Snowflake out of signed 64-bit range');

const PermissionSetSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal permission set')
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_INT64, 'Permission set out of signed 64-bit range');

const CHANNEL_KINDS: Record<number, ChannelKind> = {
  0: 'text',
  2: 'voice',
  4: 'category',
  5: 'announcement',
  13: 'stage',
  15: 'forum',
};

export const RawRoleSchema = z
  .object({
    id: SnowflakeSchema,
    name: z.string(),
    position: z.number().int(),
    permissions: PermissionSetSchema,
  })
  .transform((raw): Role => raw);

export const RawUserSchema = z.object({
  id: SnowflakeSchema,
  username: z.string(),
  // "0" marks a user without a legacy tag
  discriminator: z.string().regex(/^\d{1,4}$/).optional(),
});

export const RawMemberSchema = z
  .object({
    user: RawUserSchema,
    roles: z.array(SnowflakeSchema).default([]),
    nick: z.string().nullish(),
  })
  .transform((raw): Member => {
    const discriminator = raw.user.discriminator ? Number(raw.user.discriminator) : 0;
    return {
      user: {
        id: raw.user.id,
        name: raw.user.username,
        ...(discriminator > 0 ? { discriminator } : {}),
      },
      roles: raw.roles,
      ...(raw.nick ? { nick: raw.nick } : {}),
    };
  });

export const RawOverwriteSchema = z
  .object({
    id: SnowflakeSchema,
    type: z.union([z.literal(0), z.literal(1)]),
    allow: PermissionSetSchema,
    deny: PermissionSetSchema,
  })
  .transform(
    (raw): PermissionOverwrite => ({
      target:
        raw.type === 0 ? { type: 'role', roleId: raw.id } : { type: 'member', userId: raw.id },
      allow: raw.allow,
      deny: raw.deny,
    })
  );

export const RawChannelSchema = z
  .object({
    id: SnowflakeSchema,
    type: z.number().int(),
    name: z.string().default(''),
    position: z.number().int().default(0),
    permission_overwrites: z.array(RawOverwriteSchema).default([]),
  })
  .transform(
    (raw): Channel => ({
      id: raw.id,
      name: raw.name,
      kind: CHANNEL_KINDS[raw.type] ?? 'other',
      position: raw.position,
      permissionOverwrites: raw.permission_overwrites,
    })
  );

export const RawGuildSnapshotSchema = z
  .object({
    id: SnowflakeSchema,
    name: z.string(),
    owner_id: SnowflakeSchema,
    roles: z.array(RawRoleSchema).default([]),
    members: z.array(RawMemberSchema).default([]),
    channels: z.array(RawChannelSchema).default([]),
  })
  .transform(
    (raw): GuildSnapshotData => ({
      id: raw.id,
      name: raw.name,
      ownerId: raw.owner_id,
      roles: raw.roles,
      members: raw.members,
      channels: raw.channels,
    })
  );

export type RawGuildSnapshot = z.input<typeof RawGuildSnapshotSchema>;

/**
 * A single problem found in a raw snapshot
 */
export type SnapshotIssue = {
  path: string;
  message: string;
  code: string;
};

export type SnapshotValidationResult =
  | { valid: true; data: GuildSnapshotData; issues: [] }
  | { valid: false; issues: SnapshotIssue[] };

/**
 * Thrown by parseGuildSnapshot when the input does not validate.
 */
export class SnapshotValidationError extends Error {
  readonly code = 'SNAPSHOT_INVALID';
  readonly issues: SnapshotIssue[];

  constructor(issues: SnapshotIssue[]) {
    const first = issues[0];
    super(
      first
        ? `Invalid guild snapshot at ${first.path}: ${first.message}`
        : 'Invalid guild snapshot'
    );
    this.name = 'SnapshotValidationError';
    this.issues = issues;
  }
}

function formatPath(path: Array<string | number>): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    'guild'
  );
}

/**
 * Validate a raw guild snapshot.
 *
 * @returns Normalized data when valid, otherwise every issue found
 */
export function validateGuildSnapshot(raw: unknown): SnapshotValidationResult {
  const result = RawGuildSnapshotSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, data: result.data, issues: [] };
  }

  return {
    valid: false,
    issues: result.error.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
      code: issue.code,
    })),
  };
}

/**
 * Validate a raw guild snapshot, throwing on invalid input.
 */
export function parseGuildSnapshot(raw: unknown): GuildSnapshotData {
  const result = validateGuildSnapshot(raw);
  if (!result.valid) {
    throw new SnapshotValidationError(result.issues);
  }
  return result.data;
}
