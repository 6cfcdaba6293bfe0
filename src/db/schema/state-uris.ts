import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import { SERVICE_STATES } from '@shared/constants';

export const stateUris = pgTable('state_uris', {
  state: text('state', { enum: SERVICE_STATES }).primaryKey(),
  uri: text('uri').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
