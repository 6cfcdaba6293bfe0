import { pgTable, integer, text, timestamp } from 'drizzle-orm/pg-core';

export const tokenOwners = pgTable('token_owners', {
  tokenId: integer('token_id').primaryKey(),
  owner: text('owner').notNull(),
  mintedAt: timestamp('minted_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
