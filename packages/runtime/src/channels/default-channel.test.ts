// Tests for default channel lookup

import { describe, it, expect } from 'vitest';
import {
  Permissions,
  type Channel,
  type ChannelKind,
  type GuildSnapshotData,
  type PermissionOverwrite,
} from '@guildgate/protocol';
import { createGuildSnapshot } from '@guildgate/repositories';
import { silentLogger } from '../diagnostics/index.js';
import { defaultChannel, defaultChannelGuaranteed, sortedChannels } from './default-channel.js';

// --- Test Fixtures ---

const GUILD_ID = 50n;
const STAFF = 501n;
const { VIEW_CHANNEL } = Permissions;

const hideFromEveryone: PermissionOverwrite = {
  target: { type: 'role', roleId: GUILD_ID },
  allow: 0n,
  deny: VIEW_CHANNEL,
};

const showToStaff: PermissionOverwrite = {
  target: { type: 'role', roleId: STAFF },
  allow: VIEW_CHANNEL,
  deny: 0n,
};

function channel(
  id: bigint,
  position: number,
  kind: ChannelKind = 'text',
  overwrites: PermissionOverwrite[] = []
): Channel {
  return { id, name: `channel-${id}`, kind, position, permissionOverwrites: overwrites };
}

function createData(channels: Channel[]): GuildSnapshotData {
  return {
    id: GUILD_ID,
    name: 'Channels',
    ownerId: 1n,
    roles: [
      { id: GUILD_ID, name: '@everyone', position: 0, permissions: VIEW_CHANNEL },
      { id: STAFF, name: 'Staff', position: 1, permissions: 0n },
    ],
    members: [
      { user: { id: 1n, name: 'owner' }, roles: [] },
      { user: { id: 2n, name: 'staffer' }, roles: [STAFF] },
      { user: { id: 3n, name: 'visitor' }, roles: [] },
    ],
    channels,
  };
}

const options = { logger: silentLogger };

// --- Tests ---

describe('sortedChannels', () => {
  it('should order by position, then by ID', () => {
    const guild = createGuildSnapshot(
      createData([channel(30n, 2), channel(20n, 1), channel(10n, 2), channel(40n, 0)])
    );

    expect(sortedChannels(guild).map((c) => c.id)).toEqual([40n, 20n, 10n, 30n]);
  });
});

describe('defaultChannel', () => {
  const guild = createGuildSnapshot(
    createData([
      channel(10n, 0, 'category'),
      channel(20n, 1, 'text', [hideFromEveryone, showToStaff]),
      channel(30n, 2, 'voice'),
    ])
  );

  it('should skip categories and return the first viewable channel', () => {
    expect(defaultChannel(guild, 2n, options)?.id).toBe(20n);
  });

  it('should skip channels the member cannot view', () => {
    expect(defaultChannel(guild, 3n, options)?.id).toBe(30n);
  });

  it('should return undefined for a non-member', () => {
    expect(defaultChannel(guild, 99n, options)).toBeUndefined();
  });

  it('should return undefined when nothing is viewable', () => {
    const hidden = createGuildSnapshot(
      createData([channel(10n, 0, 'category'), channel(20n, 1, 'text', [hideFromEveryone])])
    );

    expect(defaultChannel(hidden, 3n, options)).toBeUndefined();
  });
});

describe('defaultChannelGuaranteed', () => {
  it('should return the first channel every member can view', () => {
    const guild = createGuildSnapshot(
      createData([
        channel(10n, 0, 'category'),
        channel(20n, 1, 'text', [hideFromEveryone, showToStaff]),
        channel(30n, 2, 'text'),
      ])
    );

    expect(defaultChannelGuaranteed(guild, options)?.id).toBe(30n);
  });

  it('should return undefined when no channel is visible to everyone', () => {
    const guild = createGuildSnapshot(
      createData([channel(20n, 1, 'text', [hideFromEveryone, showToStaff])])
    );

    expect(defaultChannelGuaranteed(guild, options)).toBeUndefined();
  });

  it('should return the first non-category channel in a guild without members', () => {
    const data = createData([channel(10n, 0, 'category'), channel(20n, 1, 'text', [hideFromEveryone])]);
    const guild = createGuildSnapshot({ ...data, members: [] });

    expect(defaultChannelGuaranteed(guild, options)?.id).toBe(20n);
  });
});
