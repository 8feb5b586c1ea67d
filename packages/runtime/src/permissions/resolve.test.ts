// Tests for permission resolution against guild snapshots

import { describe, it, expect } from 'vitest';
import {
  ALL_PERMISSIONS,
  Permissions,
  type Channel,
  type Guild,
  type GuildSnapshotData,
  type Member,
  type PermissionOverwrite,
} from '@guildgate/protocol';
import { createGuildSnapshot } from '@guildgate/repositories';
import { createCapturingLogger, silentLogger } from '../diagnostics/index.js';
import { MemberMismatchError } from '../errors.js';
import {
  resolvePermissions,
  memberPermissions,
  userPermissionsIn,
  partialMemberPermissionsIn,
} from './resolve.js';

// --- Test Fixtures ---

const { VIEW_CHANNEL, SEND_MESSAGES, ATTACH_FILES, ADMINISTRATOR, MANAGE_MESSAGES } = Permissions;

const GUILD_ID = 10n;
const OWNER = 1n;
const R1 = 101n;
const R2 = 102n;
const ADMIN_ROLE = 103n;

function member(id: bigint, roles: bigint[] = []): Member {
  return { user: { id, name: `user-${id}` }, roles };
}

function channel(id: bigint, overwrites: PermissionOverwrite[]): Channel {
  return { id, name: `channel-${id}`, kind: 'text', position: 0, permissionOverwrites: overwrites };
}

function roleOverwrite(roleId: bigint, allow: bigint, deny: bigint): PermissionOverwrite {
  return { target: { type: 'role', roleId }, allow, deny };
}

function memberOverwrite(userId: bigint, allow: bigint, deny: bigint): PermissionOverwrite {
  return { target: { type: 'member', userId }, allow, deny };
}

function createData(overrides: Partial<GuildSnapshotData> = {}): GuildSnapshotData {
  return {
    id: GUILD_ID,
    name: 'Test Guild',
    ownerId: OWNER,
    roles: [
      { id: GUILD_ID, name: '@everyone', position: 0, permissions: VIEW_CHANNEL },
      { id: R1, name: 'Writer', position: 1, permissions: SEND_MESSAGES },
      { id: R2, name: 'Uploader', position: 2, permissions: 0n },
      { id: ADMIN_ROLE, name: 'Admin', position: 3, permissions: ADMINISTRATOR },
    ],
    members: [member(OWNER), member(2n, [R1]), member(3n, [R1, R2]), member(4n, [ADMIN_ROLE])],
    channels: [],
    ...overrides,
  };
}

function createGuild(overrides: Partial<GuildSnapshotData> = {}): Guild {
  return createGuildSnapshot(createData(overrides));
}

const options = { logger: silentLogger };

// --- Tests ---

describe('resolvePermissions', () => {
  const guild = createGuild();

  it('should give the owner every permission regardless of overwrites', () => {
    const locked = channel(30n, [
      roleOverwrite(GUILD_ID, 0n, ALL_PERMISSIONS),
      memberOverwrite(OWNER, 0n, ALL_PERMISSIONS),
    ]);

    expect(resolvePermissions(member(OWNER), guild, undefined, options)).toBe(ALL_PERMISSIONS);
    expect(resolvePermissions(member(OWNER), guild, locked, options)).toBe(ALL_PERMISSIONS);
  });

  it('should give administrators every permission regardless of overwrites', () => {
    const locked = channel(30n, [
      roleOverwrite(GUILD_ID, 0n, VIEW_CHANNEL),
      roleOverwrite(ADMIN_ROLE, 0n, ADMINISTRATOR),
      memberOverwrite(4n, 0n, ALL_PERMISSIONS),
    ]);

    expect(resolvePermissions(member(4n, [ADMIN_ROLE]), guild, locked, options)).toBe(
      ALL_PERMISSIONS
    );
  });

  it('should grant administrator through @everyone too', () => {
    const adminEveryone = createGuild({
      roles: [{ id: GUILD_ID, name: '@everyone', position: 0, permissions: ADMINISTRATOR }],
    });

    expect(resolvePermissions(member(2n), adminEveryone, undefined, options)).toBe(
      ALL_PERMISSIONS
    );
  });

  it('should combine @everyone and role permissions at guild level', () => {
    expect(resolvePermissions(member(2n, [R1]), guild, undefined, options)).toBe(
      VIEW_CHANNEL | SEND_MESSAGES
    );
  });

  it('should let a member overwrite beat role and @everyone overwrites', () => {
    const everyoneDenies = createGuild({
      roles: [
        { id: GUILD_ID, name: '@everyone', position: 0, permissions: VIEW_CHANNEL },
        { id: R1, name: 'Writer', position: 1, permissions: 0n },
      ],
    });
    const ch = channel(30n, [
      roleOverwrite(GUILD_ID, 0n, SEND_MESSAGES),
      roleOverwrite(R1, SEND_MESSAGES, 0n),
      memberOverwrite(2n, 0n, SEND_MESSAGES),
    ]);

    expect(resolvePermissions(member(2n, [R1]), everyoneDenies, ch, options)).toBe(VIEW_CHANNEL);
  });

  it('should apply role overwrite denies before allows across roles', () => {
    const ch = channel(30n, [
      roleOverwrite(R1, 0n, ATTACH_FILES),
      roleOverwrite(R2, ATTACH_FILES, 0n),
    ]);

    const result = resolvePermissions(member(3n, [R1, R2]), guild, ch, options);
    expect(result).toBe(VIEW_CHANNEL | SEND_MESSAGES | ATTACH_FILES);
  });

  it('should ignore overwrites for roles the member does not hold', () => {
    const ch = channel(30n, [roleOverwrite(R2, MANAGE_MESSAGES, SEND_MESSAGES)]);

    expect(resolvePermissions(member(2n, [R1]), guild, ch, options)).toBe(
      VIEW_CHANNEL | SEND_MESSAGES
    );
  });

  it('should ignore member overwrites for other users', () => {
    const ch = channel(30n, [memberOverwrite(3n, 0n, VIEW_CHANNEL)]);

    expect(resolvePermissions(member(2n, [R1]), guild, ch, options)).toBe(
      VIEW_CHANNEL | SEND_MESSAGES
    );
  });

  it('should let @everyone overwrites take away role-granted permissions', () => {
    const ch = channel(30n, [roleOverwrite(GUILD_ID, 0n, SEND_MESSAGES)]);

    expect(resolvePermissions(member(2n, [R1]), guild, ch, options)).toBe(VIEW_CHANNEL);
  });

  it('should return identical results for identical inputs', () => {
    const ch = channel(30n, [
      roleOverwrite(GUILD_ID, ATTACH_FILES, SEND_MESSAGES),
      roleOverwrite(R2, SEND_MESSAGES, 0n),
    ]);
    const subject = member(3n, [R1, R2]);

    const first = resolvePermissions(subject, guild, ch, options);
    const second = resolvePermissions(subject, guild, ch, options);
    expect(second).toBe(first);
  });

  it('should not mutate the snapshot', () => {
    const ch = channel(30n, [roleOverwrite(GUILD_ID, 0n, SEND_MESSAGES)]);
    const before = guild.roles.get(R1)?.permissions;

    resolvePermissions(member(2n, [R1]), guild, ch, options);

    expect(guild.roles.get(R1)?.permissions).toBe(before);
    expect(ch.permissionOverwrites).toHaveLength(1);
  });
});

describe('integrity diagnostics', () => {
  it('should resolve with an empty @everyone contribution when the role is missing', () => {
    const logger = createCapturingLogger();
    const guild = createGuild({
      roles: [{ id: R1, name: 'Writer', position: 1, permissions: SEND_MESSAGES }],
    });

    const result = resolvePermissions(member(2n, [R1]), guild, undefined, { logger });

    expect(result).toBe(SEND_MESSAGES);
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0].level).toBe('error');
    expect(logger.entries[0].message).toBe('@everyone role missing from guild snapshot');
    expect(logger.entries[0].data).toEqual({ guildId: '10' });
  });

  it('should skip deleted roles at debug level', () => {
    const logger = createCapturingLogger();
    const guild = createGuild();

    const result = resolvePermissions(member(2n, [R1, 999n]), guild, undefined, { logger });

    expect(result).toBe(VIEW_CHANNEL | SEND_MESSAGES);
    expect(logger.entries.map((e) => e.level)).toEqual(['debug']);
    expect(logger.entries[0].data).toEqual({ guildId: '10', userId: '2', roleId: '999' });
  });

  it('should not log anything for the owner', () => {
    const logger = createCapturingLogger();
    const guild = createGuild({ roles: [] });

    expect(resolvePermissions(member(OWNER, [999n]), guild, undefined, { logger })).toBe(
      ALL_PERMISSIONS
    );
    expect(logger.entries).toHaveLength(0);
  });
});

describe('entry points', () => {
  const guild = createGuild();
  const ch = channel(30n, [roleOverwrite(GUILD_ID, 0n, VIEW_CHANNEL)]);

  it('should compute guild-level permissions with memberPermissions', () => {
    expect(memberPermissions(guild, member(2n, [R1]), options)).toBe(VIEW_CHANNEL | SEND_MESSAGES);
  });

  it('should compute channel permissions with userPermissionsIn', () => {
    expect(userPermissionsIn(guild, ch, member(2n, [R1]), options)).toBe(SEND_MESSAGES);
  });

  it('should compute channel permissions for a partial member', () => {
    expect(partialMemberPermissionsIn(guild, ch, 2n, { roles: [R1] }, options)).toBe(SEND_MESSAGES);
    expect(
      partialMemberPermissionsIn(guild, ch, 2n, { user: { id: 2n, name: 'user-2' }, roles: [R1] }, options)
    ).toBe(SEND_MESSAGES);
  });

  it('should reject a partial member whose user does not match', () => {
    expect(() =>
      partialMemberPermissionsIn(
        guild,
        ch,
        2n,
        { user: { id: 3n, name: 'user-3' }, roles: [R1] },
        options
      )
    ).toThrow(MemberMismatchError);
  });
});
