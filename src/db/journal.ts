import { count, desc, eq } from 'drizzle-orm';
import {
  resolveLimit,
  type EventJournal,
  type JournalEntry,
  type JournalQuery,
  type JournalStats,
} from '@core/journal';
import type { EventAction } from '@shared/types';
import type { Database } from './connection';
import { registryEvents } from './schema/registry-events';

/** Reads `registry_events`; rows are written by PgRegistryStore. */
export class PgEventJournal implements EventJournal {
  constructor(private readonly db: Database) {}

  async list(query: JournalQuery = {}): Promise<JournalEntry[]> {
    return this.db
      .select()
      .from(registryEvents)
      .where(query.tokenId === undefined ? undefined : eq(registryEvents.tokenId, query.tokenId))
      .orderBy(desc(registryEvents.seq))
      .limit(resolveLimit(query.limit));
  }

  async get(seq: number): Promise<JournalEntry | null> {
    const [row] = await this.db
      .select()
      .from(registryEvents)
      .where(eq(registryEvents.seq, seq));
    return row ?? null;
  }

  async stats(): Promise<JournalStats> {
    const grouped = await this.db
      .select({ action: registryEvents.action, total: count() })
      .from(registryEvents)
      .groupBy(registryEvents.action);

    const [last] = await this.db
      .select({ recordedAt: registryEvents.recordedAt })
      .from(registryEvents)
      .orderBy(desc(registryEvents.seq))
      .limit(1);

    const byAction: Partial<Record<EventAction, number>> = {};
    let total = 0;
    for (const row of grouped) {
      byAction[row.action] = row.total;
      total += row.total;
    }

    return { total, byAction, lastRecordedAt: last ? last.recordedAt : null };
  }
}
