import { DEFAULT_JOURNAL_LIMIT } from '@shared/constants';
import type { EventAction } from '@shared/types';
import { eventAction, eventTokenId, type RegistryEvent } from './events';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface JournalEntry {
  seq: number;
  tokenId: number | null;
  action: EventAction;
  event: RegistryEvent;
  recordedAt: Date;
}

export interface JournalQuery {
  limit?: number;
  tokenId?: number;
}

export interface JournalStats {
  total: number;
  byAction: Partial<Record<EventAction, number>>;
  lastRecordedAt: Date | null;
}

/**
 * Read side of the append-only record of every event the registry has
 * emitted. Writes go through the registry's store, inside its lock.
 */
export interface EventJournal {
  /** Newest first. */
  list(query?: JournalQuery): Promise<JournalEntry[]>;
  get(seq: number): Promise<JournalEntry | null>;
  stats(): Promise<JournalStats>;
}

export function resolveLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isInteger(limit) || limit < 1) {
    return DEFAULT_JOURNAL_LIMIT;
  }
  return limit;
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

export class InMemoryEventJournal implements EventJournal {
  private readonly entries: JournalEntry[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async append(events: readonly RegistryEvent[]): Promise<JournalEntry[]> {
    const recordedAt = this.clock();
    const base = this.entries.length;
    const added = events.map((event, index) => ({
      seq: base + index + 1,
      tokenId: eventTokenId(event),
      action: eventAction(event),
      event,
      recordedAt,
    }));
    this.entries.push(...added);
    return added;
  }

  async list(query: JournalQuery = {}): Promise<JournalEntry[]> {
    const limit = resolveLimit(query.limit);
    const matching =
      query.tokenId === undefined
        ? this.entries
        : this.entries.filter((e) => e.tokenId === query.tokenId);
    return matching.slice(-limit).reverse();
  }

  async get(seq: number): Promise<JournalEntry | null> {
    return this.entries.find((e) => e.seq === seq) ?? null;
  }

  async stats(): Promise<JournalStats> {
    const byAction: Partial<Record<EventAction, number>> = {};
    for (const entry of this.entries) {
      byAction[entry.action] = (byAction[entry.action] ?? 0) + 1;
    }
    const last = this.entries[this.entries.length - 1];
    return {
      total: this.entries.length,
      byAction,
      lastRecordedAt: last ? last.recordedAt : null,
    };
  }
}
