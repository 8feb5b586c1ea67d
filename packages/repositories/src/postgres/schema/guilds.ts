import { pgTable, bigint, text, timestamp } from 'drizzle-orm/pg-core';

/**
 * Guilds table - one row per stored snapshot.
 */
export const guilds = pgTable('guilds', {
  id: bigint('id', { mode: 'bigint' }).primaryKey(),
  name: text('name').notNull(),
  ownerId: bigint('owner_id', { mode: 'bigint' }).notNull(),
  replacedAt: timestamp('replaced_at', { withTimezone: true }).notNull().defaultNow(),
});
