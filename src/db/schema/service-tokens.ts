import { pgTable, integer, text, timestamp } from 'drizzle-orm/pg-core';
import { SERVICE_STATES } from '@shared/constants';

export const serviceTokens = pgTable('service_tokens', {
  id: integer('id').primaryKey(),
  state: text('state', { enum: SERVICE_STATES }).notNull(),
  rating: integer('rating').notNull().default(0),
  companion: text('companion'),
  evidenceOf: integer('evidence_of'),
  evidenceFor: integer('evidence_for'),
  uri: text('uri').notNull().default(''),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
