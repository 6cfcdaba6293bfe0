import { pgTable, serial, integer, text, jsonb, timestamp } from 'drizzle-orm/pg-core';
import { EVENT_ACTIONS } from '@shared/constants';
import type { RegistryEvent } from '@core/events';

export const registryEvents = pgTable('registry_events', {
  seq: serial('seq').primaryKey(),
  tokenId: integer('token_id'),
  action: text('action', { enum: EVENT_ACTIONS }).notNull(),
  event: jsonb('event').$type<RegistryEvent>().notNull(),
  recordedAt: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
});
