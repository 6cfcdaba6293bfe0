import type { ServiceState } from '@shared/types';
import type { RegistryEvent } from './events';
import { InMemoryEventJournal } from './journal';
import type { ServiceToken } from './token';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything a registry needs to resume where a previous process stopped. */
export interface RegistrySnapshot {
  tokens: ServiceToken[];
  stateUris: Partial<Record<ServiceState, string>>;
}

/** One registry mutation: the records it touched and the events it emitted. */
export interface RegistryCommit {
  tokens: ServiceToken[];
  stateUri: { state: ServiceState; uri: string } | null;
  events: RegistryEvent[];
}

/**
 * Durable side of the registry. `commit` is called inside the registry lock,
 * after the ledger accepted the change and before memory is updated; it must
 * apply the whole commit or nothing.
 */
export interface RegistryStore {
  load(): Promise<RegistrySnapshot>;
  commit(commit: RegistryCommit): Promise<void>;
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

export class InMemoryRegistryStore implements RegistryStore {
  private readonly tokens = new Map<number, ServiceToken>();
  private readonly stateUris = new Map<ServiceState, string>();

  constructor(readonly journal: InMemoryEventJournal = new InMemoryEventJournal()) {}

  async load(): Promise<RegistrySnapshot> {
    const stateUris: Partial<Record<ServiceState, string>> = {};
    for (const [state, uri] of this.stateUris) {
      stateUris[state] = uri;
    }
    return {
      tokens: [...this.tokens.values()].sort((a, b) => a.id - b.id),
      stateUris,
    };
  }

  async commit(commit: RegistryCommit): Promise<void> {
    // journal first: it is the only step here that can fail
    await this.journal.append(commit.events);
    for (const token of commit.tokens) {
      this.tokens.set(token.id, token);
    }
    if (commit.stateUri) {
      this.stateUris.set(commit.stateUri.state, commit.stateUri.uri);
    }
  }
}
