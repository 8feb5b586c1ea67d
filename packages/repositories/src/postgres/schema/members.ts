import { pgTable, bigint, text, integer, index, primaryKey } from 'drizzle-orm/pg-core';
import { guilds } from './guilds.js';

/**
 * Members table - a user's membership in one guild.
 */
export const members = pgTable(
  'members',
  {
    guildId: bigint('guild_id', { mode: 'bigint' })
      .notNull()
      .references(() => guilds.id, { onDelete: 'cascade' }),
    userId: bigint('user_id', { mode: 'bigint' }).notNull(),
    username: text('username').notNull(),
    discriminator: integer('discriminator'),
    nick: text('nick'),
  },
  (table) => [primaryKey({ columns: [table.guildId, table.userId] })]
);

/**
 * Member role assignments.
 *
 * role_id deliberately has no foreign key: a member may keep a role ID after
 * the role itself is gone.
 */
export const memberRoles = pgTable(
  'member_roles',
  {
    guildId: bigint('guild_id', { mode: 'bigint' })
      .notNull()
      .references(() => guilds.id, { onDelete: 'cascade' }),
    userId: bigint('user_id', { mode: 'bigint' }).notNull(),
    roleId: bigint('role_id', { mode: 'bigint' }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.guildId, table.userId, table.roleId] }),
    index('member_roles_role_idx').on(table.roleId),
  ]
);
