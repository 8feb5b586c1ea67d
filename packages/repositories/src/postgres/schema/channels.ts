import { pgTable, bigint, text, integer, index, primaryKey } from 'drizzle-orm/pg-core';
import type { ChannelKind } from '@guildgate/protocol';
import { guilds } from './guilds.js';

/**
 * Channels table.
 */
export const channels = pgTable(
  'channels',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    guildId: bigint('guild_id', { mode: 'bigint' })
      .notNull()
      .references(() => guilds.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    kind: text('kind', {
      enum: ['text', 'voice', 'category', 'announcement', 'stage', 'forum', 'other'],
    })
      .notNull()
      .$type<ChannelKind>(),
    position: integer('position').notNull(),
  },
  (table) => [index('channels_guild_idx').on(table.guildId)]
);

/**
 * Channel permission overwrites, kept in their original order via `ordinal`.
 * A channel may carry more than one overwrite for the same target; the last
 * one applies.
 */
export const permissionOverwrites = pgTable(
  'permission_overwrites',
  {
    guildId: bigint('guild_id', { mode: 'bigint' })
      .notNull()
      .references(() => guilds.id, { onDelete: 'cascade' }),
    channelId: bigint('channel_id', { mode: 'bigint' })
      .notNull()
      .references(() => channels.id, { onDelete: 'cascade' }),
    targetType: text('target_type', { enum: ['role', 'member'] }).notNull(),
    targetId: bigint('target_id', { mode: 'bigint' }).notNull(),
    allow: bigint('allow', { mode: 'bigint' }).notNull(),
    deny: bigint('deny', { mode: 'bigint' }).notNull(),
    ordinal: integer('ordinal').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.channelId, table.ordinal] }),
    index('permission_overwrites_target_idx').on(
      table.channelId,
      table.targetType,
      table.targetId
    ),
    index('permission_overwrites_guild_idx').on(table.guildId),
  ]
);
