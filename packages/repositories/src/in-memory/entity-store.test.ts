// Tests for entity stores and snapshot construction

import { describe, it, expect } from 'vitest';
import type { GuildSnapshotData, Role } from '@guildgate/protocol';
import { createEntityStore, createGuildSnapshot, snapshotToData } from './entity-store.js';

// --- Test Fixtures ---

function createSnapshotData(): GuildSnapshotData {
  return {
    id: 10n,
    name: 'Test Guild',
    ownerId: 1n,
    roles: [
      { id: 10n, name: '@everyone', position: 0, permissions: 1024n },
      { id: 20n, name: 'Helper', position: 1, permissions: 2048n },
    ],
    members: [{ user: { id: 2n, name: 'helper' }, roles: [20n, 99n] }],
    channels: [
      { id: 30n, name: 'general', kind: 'text', position: 0, permissionOverwrites: [] },
    ],
  };
}

// --- Tests ---

describe('createEntityStore', () => {
  it('should index entities by key', () => {
    const roles: Role[] = [
      { id: 1n, name: 'a', position: 0, permissions: 0n },
      { id: 2n, name: 'b', position: 1, permissions: 0n },
    ];
    const store = createEntityStore(roles, (role) => role.id);

    expect(store.size).toBe(2);
    expect(store.get(2n)?.name).toBe('b');
    expect(store.has(1n)).toBe(true);
  });

  it('should return undefined for unknown IDs', () => {
    const store = createEntityStore<bigint, Role>([], (role) => role.id);

    expect(store.get(123n)).toBeUndefined();
    expect(store.has(123n)).toBe(false);
  });

  it('should keep the later entity when keys collide', () => {
    const store = createEntityStore(
      [
        { id: 1n, name: 'first', position: 0, permissions: 0n },
        { id: 1n, name: 'second', position: 0, permissions: 0n },
      ],
      (role) => role.id
    );

    expect(store.size).toBe(1);
    expect(store.get(1n)?.name).toBe('second');
  });
});

describe('createGuildSnapshot', () => {
  it('should index roles, members and channels', () => {
    const guild = createGuildSnapshot(createSnapshotData());

    expect(guild.id).toBe(10n);
    expect(guild.ownerId).toBe(1n);
    expect(guild.roles.get(20n)?.name).toBe('Helper');
    expect(guild.members.get(2n)?.user.name).toBe('helper');
    expect(guild.channels.get(30n)?.name).toBe('general');
  });

  it('should keep dangling role IDs on members', () => {
    const guild = createGuildSnapshot(createSnapshotData());

    expect(guild.members.get(2n)?.roles).toEqual([20n, 99n]);
    expect(guild.roles.get(99n)).toBeUndefined();
  });

  it('should freeze the snapshot object', () => {
    const guild = createGuildSnapshot(createSnapshotData());
    expect(Object.isFrozen(guild)).toBe(true);
  });

  it('should not change when the source data is mutated afterwards', () => {
    const data = createSnapshotData();
    const guild = createGuildSnapshot(data);

    data.roles[1].permissions = 8n;
    data.members[0].roles.push(10n);
    data.members[0].user.name = 'renamed';
    data.channels[0].permissionOverwrites.push({
      target: { type: 'role', roleId: 10n },
      allow: 0n,
      deny: 1024n,
    });

    expect(guild.roles.get(20n)?.permissions).toBe(2048n);
    expect(guild.members.get(2n)?.roles).toEqual([20n, 99n]);
    expect(guild.members.get(2n)?.user.name).toBe('helper');
    expect(guild.channels.get(30n)?.permissionOverwrites).toEqual([]);
  });

  it('should flatten back to equivalent data', () => {
    const data = createSnapshotData();
    expect(snapshotToData(createGuildSnapshot(data))).toEqual(data);
  });
});
