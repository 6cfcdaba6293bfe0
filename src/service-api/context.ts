import type { EventJournal } from '@core/journal';
import type { ServiceRegistry } from '@core/registry';

export type StorageKind = 'memory' | 'postgres';

/** Everything a router needs; handed to each router factory explicitly. */
export interface ApiContext {
  registry: ServiceRegistry;
  journal: EventJournal;
  storage: StorageKind;
}
