import { DEFAULT_COLLECTION } from '@shared/constants';
import type {
  CollectionInfoRecord,
  LifecycleName,
  OwnedServiceRecord,
  OwnerStatsRecord,
  RegistrySummaryRecord,
  ServiceRecord,
  ServiceState,
} from '@shared/types';
import type { RegistryEvent } from './events';
import { InMemoryOwnershipLedger, type OwnershipLedger } from './ledger';
import {
  decodeState,
  describeStates,
  getLifecycle,
  isMember,
  ordinalOf,
  type Lifecycle,
} from './lifecycle';
import { fail, succeed, type Failure, type Outcome } from './outcome';
import { transition, type TransitionRoute } from './state-machine';
import { computeOwnerStats, computeRegistrySummary, toOwnedRecord } from './stats';
import {
  InMemoryRegistryStore,
  type RegistryCommit,
  type RegistrySnapshot,
  type RegistryStore,
} from './store';
import { isEvidenceToken, type ServiceToken } from './token';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ServiceRegistryOptions {
  lifecycle?: LifecycleName;
  ledger?: OwnershipLedger;
  store?: RegistryStore;
  collection?: { name: string; symbol: string };
}

export interface CreatedService {
  tokenId: number;
  owner: string;
  uri: string;
  events: RegistryEvent[];
}

export interface StateChange {
  tokenId: number;
  fromState: ServiceState;
  toState: ServiceState;
  rating: number;
  uri: string;
  companion: string | null;
  evidenceId: number | null;
  events: RegistryEvent[];
}

export interface CompanionAssignment {
  tokenId: number;
  companion: string;
  state: ServiceState;
  /** Present when assigning also moved the token (transfer-and-match policy). */
  transition: StateChange | null;
  events: RegistryEvent[];
}

export interface StateUriUpdate {
  state: ServiceState;
  uri: string;
  changed: boolean;
  events: RegistryEvent[];
}

export type StateInput = ServiceState | number | string;

/** Trims a principal; returns null when nothing usable is left. */
export function normalizePrincipal(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Owns every service token, the per-state URI table and the id counter.
 *
 * All public methods run one at a time behind a registry-wide lock. A
 * mutation calls the ledger, then commits records and events to the store,
 * then updates memory; a rejected operation leaves nothing behind, and a
 * failed store commit reverts the ledger call before rethrowing.
 *
 * Use `ServiceRegistry.open` to resume from a store that already holds data.
 */
export class ServiceRegistry {
  readonly lifecycle: Lifecycle;
  readonly ledger: OwnershipLedger;
  readonly store: RegistryStore;
  readonly collection: { name: string; symbol: string };

  private readonly tokens = new Map<number, ServiceToken>();
  private readonly stateUris = new Map<ServiceState, string>();
  private counter = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: ServiceRegistryOptions = {}) {
    this.lifecycle = getLifecycle(options.lifecycle ?? 'full');
    this.ledger = options.ledger ?? new InMemoryOwnershipLedger();
    this.store = options.store ?? new InMemoryRegistryStore();
    this.collection = options.collection ?? { ...DEFAULT_COLLECTION };
  }

  /** Builds a registry and loads the tokens and URI table its store holds. */
  static async open(options: ServiceRegistryOptions = {}): Promise<ServiceRegistry> {
    const registry = new ServiceRegistry(options);
    registry.restore(await registry.store.load());
    return registry;
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  createService(recipient: string): Promise<Outcome<CreatedService>> {
    return this.exclusive<Outcome<CreatedService>>(async () => {
      const owner = normalizePrincipal(recipient);
      if (!owner) {
        return fail('InvalidArgument', 'Recipient must be a non-empty principal');
      }

      const tokenId = this.counter;
      const minted = await this.callLedger(`mint of token ${tokenId}`, () =>
        this.ledger.mint(owner, tokenId),
      );
      if (!minted.ok) return minted;

      const initial = this.lifecycle.initial;
      const token: ServiceToken = {
        id: tokenId,
        state: initial,
        rating: 0,
        companion: null,
        evidenceOf: null,
        evidenceFor: null,
        uri: this.stateUris.get(initial) ?? '',
      };
      const created: RegistryEvent = { type: 'SERVICE_CREATED', tokenId, owner };
      await this.persist({ tokens: [token], stateUri: null, events: [created] }, () =>
        this.ledger.burn(owner, tokenId),
      );

      this.tokens.set(tokenId, token);
      this.counter = tokenId + 1;
      return succeed({ tokenId, owner, uri: token.uri, events: [created] });
    });
  }

  assignCompanion(id: number, companion: string): Promise<Outcome<CompanionAssignment>> {
    return this.exclusive<Outcome<CompanionAssignment>>(async () => {
      const token = this.tokens.get(id);
      if (!token) return this.notFound(id);

      const principal = normalizePrincipal(companion);
      if (!principal) {
        return fail('InvalidArgument', 'Companion must be a non-empty principal');
      }

      if (isEvidenceToken(token)) {
        return fail(
          'PreconditionFailed',
          `Token ${id} is an evidence record and cannot change`,
        );
      }

      const assigned: RegistryEvent = {
        type: 'COMPANION_ASSIGNED',
        tokenId: id,
        companion: principal,
      };

      if (this.lifecycle.companionPolicy === 'record-only') {
        const updated: ServiceToken = { ...token, companion: principal };
        await this.persist({ tokens: [updated], stateUri: null, events: [assigned] });
        this.tokens.set(id, updated);
        return succeed({
          tokenId: id,
          companion: principal,
          state: token.state,
          transition: null,
          events: [assigned],
        });
      }

      const changed = await this.applyTransition(token, 'Matched', 'assignCompanion', {
        companion: principal,
        precededBy: [assigned],
      });
      if (!changed.ok) return changed;

      return succeed({
        tokenId: id,
        companion: principal,
        state: changed.value.toState,
        transition: changed.value,
        events: [assigned, ...changed.value.events],
      });
    });
  }

  changeState(id: number, newState: StateInput, rating?: number): Promise<Outcome<StateChange>> {
    return this.exclusive<Outcome<StateChange>>(async () => {
      const token = this.tokens.get(id);
      if (!token) return this.notFound(id);

      const target = decodeState(this.lifecycle, newState);
      if (!target) {
        return fail(
          'InvalidTransition',
          `'${String(newState)}' is not a state of the ${this.lifecycle.name} lifecycle`,
        );
      }

      return this.applyTransition(token, target, 'changeState', { rating });
    });
  }

  /** Pays a rated service: `changeState(id, 'Paid')` with its evidence mint. */
  markPaid(id: number): Promise<Outcome<StateChange>> {
    return this.shortcut(id, 'Paid', 'markPaid');
  }

  /** Closes a matched service: `changeState(id, 'Finished')`. */
  finalizeService(id: number): Promise<Outcome<StateChange>> {
    return this.shortcut(id, 'Finished', 'finalizeService');
  }

  configureStateURI(state: StateInput, uri: string): Promise<Outcome<StateUriUpdate>> {
    return this.exclusive<Outcome<StateUriUpdate>>(async () => {
      const target = decodeState(this.lifecycle, state);
      if (!target) {
        return fail(
          'InvalidTransition',
          `'${String(state)}' is not a state of the ${this.lifecycle.name} lifecycle`,
        );
      }
      if (typeof uri !== 'string' || uri.trim().length === 0) {
        return fail('InvalidArgument', 'URI must be a non-empty string');
      }

      if (this.stateUris.get(target) === uri) {
        return succeed({ state: target, uri, changed: false, events: [] });
      }

      const configured: RegistryEvent = { type: 'STATE_URI_CONFIGURED', state: target, uri };
      await this.persist({ tokens: [], stateUri: { state: target, uri }, events: [configured] });
      this.stateUris.set(target, uri);
      return succeed({ state: target, uri, changed: true, events: [configured] });
    });
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  nextId(): number {
    return this.counter;
  }

  collectionInfo(): CollectionInfoRecord {
    return {
      name: this.collection.name,
      symbol: this.collection.symbol,
      lifecycle: this.lifecycle.name,
      states: describeStates(this.lifecycle),
      nextId: this.counter,
    };
  }

  stateURI(state: StateInput): Promise<Outcome<string | null>> {
    return this.exclusive<Outcome<string | null>>(async () => {
      const target = decodeState(this.lifecycle, state);
      if (!target) {
        return fail(
          'InvalidTransition',
          `'${String(state)}' is not a state of the ${this.lifecycle.name} lifecycle`,
        );
      }
      return succeed(this.stateUris.get(target) ?? null);
    });
  }

  stateUriTable(): Promise<Partial<Record<ServiceState, string>>> {
    return this.exclusive<Partial<Record<ServiceState, string>>>(async () => {
      const table: Partial<Record<ServiceState, string>> = {};
      for (const state of this.lifecycle.states) {
        const uri = this.stateUris.get(state);
        if (uri !== undefined) table[state] = uri;
      }
      return table;
    });
  }

  stateOf(id: number): Promise<Outcome<ServiceState>> {
    return this.read(id, (token) => token.state);
  }

  ratingOf(id: number): Promise<Outcome<number>> {
    return this.read(id, (token) => token.rating);
  }

  companionOf(id: number): Promise<Outcome<string | null>> {
    return this.read(id, (token) => token.companion);
  }

  evidenceOf(id: number): Promise<Outcome<number | null>> {
    return this.read(id, (token) => token.evidenceOf);
  }

  uriOf(id: number): Promise<Outcome<string>> {
    return this.read(id, (token) => token.uri);
  }

  ownerOf(id: number): Promise<Outcome<string | null>> {
    return this.exclusive<Outcome<string | null>>(async () => {
      if (!this.tokens.has(id)) return this.notFound(id);
      return this.callLedger(`owner lookup of token ${id}`, () => this.ledger.ownerOf(id));
    });
  }

  getService(id: number): Promise<Outcome<ServiceRecord>> {
    return this.exclusive<Outcome<ServiceRecord>>(async () => {
      const token = this.tokens.get(id);
      if (!token) return this.notFound(id);

      const owner = await this.callLedger(`owner lookup of token ${id}`, () =>
        this.ledger.ownerOf(id),
      );
      if (!owner.ok) return owner;

      return succeed({
        id: token.id,
        owner: owner.value,
        state: token.state,
        ordinal: ordinalOf(this.lifecycle, token.state),
        rating: token.rating,
        companion: token.companion,
        evidenceOf: token.evidenceOf,
        evidenceFor: token.evidenceFor,
        uri: token.uri,
      });
    });
  }

  listByOwner(owner: string): Promise<Outcome<OwnedServiceRecord[]>> {
    return this.exclusive<Outcome<OwnedServiceRecord[]>>(async () => {
      const owned = await this.ownedBy(owner);
      if (!owned.ok) return owned;
      return succeed(owned.value.tokens.map(toOwnedRecord));
    });
  }

  statsByOwner(owner: string): Promise<Outcome<OwnerStatsRecord>> {
    return this.exclusive<Outcome<OwnerStatsRecord>>(async () => {
      const owned = await this.ownedBy(owner);
      if (!owned.ok) return owned;
      return succeed(computeOwnerStats(this.lifecycle, owned.value.owner, owned.value.tokens));
    });
  }

  summary(): Promise<RegistrySummaryRecord> {
    return this.exclusive<RegistrySummaryRecord>(async () =>
      computeRegistrySummary(this.lifecycle, this.snapshot(), this.counter),
    );
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Runs `work` after every previously queued operation has settled. */
  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.tail.then(work);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private restore(snapshot: RegistrySnapshot): void {
    for (const token of snapshot.tokens) {
      if (!isMember(this.lifecycle, token.state)) {
        throw new Error(
          `Stored token ${token.id} is in state '${token.state}', which the ${this.lifecycle.name} lifecycle does not have`,
        );
      }
      this.tokens.set(token.id, token);
      this.counter = Math.max(this.counter, token.id + 1);
    }
    for (const state of this.lifecycle.states) {
      const uri = snapshot.stateUris[state];
      if (uri !== undefined) this.stateUris.set(state, uri);
    }
  }

  /**
   * Writes a commit to the store. When the store refuses it, `revert` undoes
   * the ledger call that preceded it and the store error is rethrown.
   */
  private async persist(commit: RegistryCommit, revert?: () => Promise<void>): Promise<void> {
    try {
      await this.store.commit(commit);
    } catch (err) {
      if (revert) {
        try {
          await revert();
        } catch (revertErr) {
          console.error(
            `[REGISTRY] Ledger left ahead of the store after a failed commit: ${describeError(revertErr)}`,
          );
        }
      }
      throw err;
    }
  }

  private notFound(id: number): Failure {
    return fail('NotFound', `Service token ${id} not found`);
  }

  private read<T>(id: number, pick: (token: ServiceToken) => T): Promise<Outcome<T>> {
    return this.exclusive<Outcome<T>>(async () => {
      const token = this.tokens.get(id);
      if (!token) return this.notFound(id);
      return succeed(pick(token));
    });
  }

  private snapshot(): ServiceToken[] {
    return [...this.tokens.values()].sort((a, b) => a.id - b.id);
  }

  private async callLedger<T>(what: string, call: () => Promise<T>): Promise<Outcome<T>> {
    try {
      return succeed(await call());
    } catch (err) {
      return fail('TransferFailed', `Ledger rejected ${what}: ${describeError(err)}`);
    }
  }

  private async ownedBy(
    owner: string,
  ): Promise<Outcome<{ owner: string; tokens: ServiceToken[] }>> {
    const principal = normalizePrincipal(owner);
    if (!principal) {
      return fail('InvalidArgument', 'Owner must be a non-empty principal');
    }

    const tokens: ServiceToken[] = [];
    for (const token of this.snapshot()) {
      const holder = await this.callLedger(`owner lookup of token ${token.id}`, () =>
        this.ledger.ownerOf(token.id),
      );
      if (!holder.ok) return holder;
      if (holder.value === principal) tokens.push(token);
    }

    return succeed({ owner: principal, tokens });
  }

  private shortcut(
    id: number,
    target: ServiceState,
    route: TransitionRoute,
  ): Promise<Outcome<StateChange>> {
    return this.exclusive<Outcome<StateChange>>(async () => {
      if (!isMember(this.lifecycle, target)) {
        return fail(
          'InvalidTransition',
          `${route} is not available in the ${this.lifecycle.name} lifecycle`,
        );
      }

      const token = this.tokens.get(id);
      if (!token) return this.notFound(id);

      return this.applyTransition(token, target, route, {});
    });
  }

  /**
   * Validates a transition against the table, performs its ledger side
   * effect, persists the result, then commits every in-memory change in one
   * synchronous step. `precededBy` events are persisted ahead of the
   * transition's own. Must be called from inside `exclusive`.
   */
  private async applyTransition(
    token: ServiceToken,
    target: ServiceState,
    route: TransitionRoute,
    input: { rating?: number; companion?: string; precededBy?: RegistryEvent[] },
  ): Promise<Outcome<StateChange>> {
    const companion = input.companion ?? token.companion;
    const precededBy = input.precededBy ?? [];

    const result = transition(target, route, {
      tokenId: token.id,
      lifecycle: this.lifecycle,
      currentState: token.state,
      companion,
      rating: input.rating,
      isEvidence: isEvidenceToken(token),
    });
    if (!result.ok) return fail(result.kind, result.error);

    const { fromState, newState, rating } = result;
    const uri = this.stateUris.get(newState) ?? token.uri;
    const changedEvent: RegistryEvent = {
      type: 'STATE_CHANGED',
      tokenId: token.id,
      fromState,
      toState: newState,
      rating: rating > 0 ? rating : null,
    };

    const change = (evidenceId: number | null, events: RegistryEvent[]): StateChange => ({
      tokenId: token.id,
      fromState,
      toState: newState,
      rating,
      uri,
      companion,
      evidenceId,
      events,
    });

    switch (result.effect) {
      case 'none': {
        const next: ServiceToken = { ...token, state: newState, rating, companion, uri };
        const events = [changedEvent];
        await this.persist({ tokens: [next], stateUri: null, events: [...precededBy, ...events] });
        this.tokens.set(token.id, next);
        return succeed(change(null, events));
      }

      case 'transfer-to-companion': {
        if (!companion) {
          return fail('PreconditionFailed', `Token ${token.id} has no companion assigned`);
        }

        const holder = await this.callLedger(`owner lookup of token ${token.id}`, () =>
          this.ledger.ownerOf(token.id),
        );
        if (!holder.ok) return holder;
        const from = holder.value;
        if (!from) {
          return fail('TransferFailed', `Ledger has no owner recorded for token ${token.id}`);
        }

        const moved = await this.callLedger(`transfer of token ${token.id}`, () =>
          this.ledger.transfer(from, companion, token.id),
        );
        if (!moved.ok) return moved;

        const next: ServiceToken = { ...token, state: newState, rating, companion, uri };
        const events: RegistryEvent[] = [
          { type: 'OWNERSHIP_TRANSFERRED', tokenId: token.id, from, to: companion },
          changedEvent,
        ];
        await this.persist(
          { tokens: [next], stateUri: null, events: [...precededBy, ...events] },
          () => this.ledger.transfer(companion, from, token.id),
        );
        this.tokens.set(token.id, next);
        return succeed(change(null, events));
      }

      case 'mint-evidence': {
        if (!companion) {
          return fail('PreconditionFailed', `Token ${token.id} has no companion assigned`);
        }

        const evidenceId = this.counter;
        const minted = await this.callLedger(`mint of evidence token ${evidenceId}`, () =>
          this.ledger.mint(companion, evidenceId),
        );
        if (!minted.ok) return minted;

        const evidence: ServiceToken = {
          id: evidenceId,
          state: newState,
          rating: token.rating,
          companion,
          evidenceOf: null,
          evidenceFor: token.id,
          uri: this.stateUris.get(newState) ?? '',
        };

        const paid: ServiceToken = {
          ...token,
          state: newState,
          rating,
          companion,
          uri,
          evidenceOf: evidenceId,
        };
        const events: RegistryEvent[] = [
          changedEvent,
          {
            type: 'EVIDENCE_MINTED',
            tokenId: token.id,
            evidenceId,
            companion,
            rating: token.rating,
          },
        ];
        await this.persist(
          { tokens: [paid, evidence], stateUri: null, events: [...precededBy, ...events] },
          () => this.ledger.burn(companion, evidenceId),
        );

        this.tokens.set(evidenceId, evidence);
        this.tokens.set(token.id, paid);
        this.counter = evidenceId + 1;
        return succeed(change(evidenceId, events));
      }
    }
  }
}
