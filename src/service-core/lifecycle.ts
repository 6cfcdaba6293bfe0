import {
  FULL_SERVICE_STATES,
  LIFECYCLES,
  SIMPLE_SERVICE_STATES,
} from '@shared/constants';
import type { LifecycleName, ServiceState } from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * How `assignCompanion` behaves.
 *
 * - `record-only`: stores the companion, leaves state and ownership alone.
 * - `transfer-and-match`: requires `Created`, hands the token to the
 *   companion and moves it to `Matched` in the same operation.
 */
export type CompanionPolicy = 'record-only' | 'transfer-and-match';

export interface Lifecycle {
  name: LifecycleName;
  states: readonly ServiceState[];
  initial: ServiceState;
  terminal: ServiceState;
  companionPolicy: CompanionPolicy;
  /** States that are only ever entered with a rating attached. */
  ratedStates: readonly ServiceState[];
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

export const LIFECYCLE_DEFINITIONS: Record<LifecycleName, Lifecycle> = {
  full: {
    name: 'full',
    states: FULL_SERVICE_STATES,
    initial: 'Created',
    terminal: 'Paid',
    companionPolicy: 'record-only',
    ratedStates: ['Rated'],
  },
  simplified: {
    name: 'simplified',
    states: SIMPLE_SERVICE_STATES,
    initial: 'Created',
    terminal: 'Finished',
    companionPolicy: 'transfer-and-match',
    ratedStates: [],
  },
};

export function isLifecycleName(value: unknown): value is LifecycleName {
  return LIFECYCLES.some((name) => name === value);
}

export function getLifecycle(name: LifecycleName): Lifecycle {
  return LIFECYCLE_DEFINITIONS[name];
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/** 1-based position of `state` in the lifecycle, or 0 when it is not a member. */
export function ordinalOf(lifecycle: Lifecycle, state: ServiceState): number {
  return lifecycle.states.indexOf(state) + 1;
}

export function isMember(lifecycle: Lifecycle, state: ServiceState): boolean {
  return lifecycle.states.includes(state);
}

/**
 * Decodes a state given by name (`"Rated"`, case-insensitive) or by its
 * 1-based ordinal (`4`, `"4"`). Returns null for anything that is not a
 * member of the lifecycle.
 */
export function decodeState(lifecycle: Lifecycle, value: unknown): ServiceState | null {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 1 || value > lifecycle.states.length) {
      return null;
    }
    return lifecycle.states[value - 1];
  }

  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return decodeState(lifecycle, Number(trimmed));
  }

  const match = lifecycle.states.find(
    (state) => state.toLowerCase() === trimmed.toLowerCase(),
  );
  return match ?? null;
}

export function describeStates(
  lifecycle: Lifecycle,
): { name: ServiceState; ordinal: number }[] {
  return lifecycle.states.map((name, index) => ({ name, ordinal: index + 1 }));
}
