// Default channel lookup

import {
  Permissions,
  compareSnowflakes,
  contains,
  type Channel,
  type Guild,
  type UserId,
} from '@guildgate/protocol';
import type { EngineOptions } from '../diagnostics/index.js';
import { userPermissionsIn } from '../permissions/index.js';

/**
 * Channels in display order: by position, then by ID.
 */
export function sortedChannels(guild: Guild): Channel[] {
  return [...guild.channels.values()].sort(
    (a, b) => a.position - b.position || compareSnowflakes(a.id, b.id)
  );
}

/**
 * The first channel the user can view, skipping categories.
 *
 * Returns undefined if the user is not a member or can view no channel.
 */
export function defaultChannel(
  guild: Guild,
  userId: UserId,
  options: EngineOptions = {}
): Channel | undefined {
  const member = guild.members.get(userId);
  if (!member) {
    return undefined;
  }

  return sortedChannels(guild).find(
    (channel) =>
      channel.kind !== 'category' &&
      contains(userPermissionsIn(guild, channel, member, options), Permissions.VIEW_CHANNEL)
  );
}

/**
 * The first channel every member can view, skipping categories.
 *
 * Resolves permissions for every member in every candidate channel, so cost
 * grows with channels × members.
 */
export function defaultChannelGuaranteed(
  guild: Guild,
  options: EngineOptions = {}
): Channel | undefined {
  const members = [...guild.members.values()];

  return sortedChannels(guild).find(
    (channel) =>
      channel.kind !== 'category' &&
      members.every((member) =>
        contains(userPermissionsIn(guild, channel, member, options), Permissions.VIEW_CHANNEL)
      )
  );
}
