import { pgTable, bigint, text, integer, index } from 'drizzle-orm/pg-core';
import { guilds } from './guilds.js';

/**
 * Roles table. The @everyone role is stored like any other role, under the
 * guild's own ID.
 */
export const roles = pgTable(
  'roles',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    guildId: bigint('guild_id', { mode: 'bigint' })
      .notNull()
      .references(() => guilds.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    position: integer('position').notNull(),
    permissions: bigint('permissions', { mode: 'bigint' }).notNull(),
  },
  (table) => [index('roles_guild_idx').on(table.guildId)]
);
