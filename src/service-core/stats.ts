import type {
  OwnedServiceRecord,
  OwnerStatsRecord,
  RegistrySummaryRecord,
  ServiceState,
} from '@shared/types';
import type { Lifecycle } from './lifecycle';
import { isEvidenceToken, type ServiceToken } from './token';

// Every aggregate here is a linear scan over the token population; no index is
// maintained alongside the registry.

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function emptyStateCounts(
  lifecycle: Lifecycle,
): Partial<Record<ServiceState, number>> {
  const counts: Partial<Record<ServiceState, number>> = {};
  for (const state of lifecycle.states) {
    counts[state] = 0;
  }
  return counts;
}

/** Share of `part` in `whole` as a percentage rounded to two decimals. */
export function percentage(part: number, whole: number): number {
  if (whole === 0) return 0;
  return Math.round((part / whole) * 10000) / 100;
}

function countByState(
  lifecycle: Lifecycle,
  tokens: readonly ServiceToken[],
): Partial<Record<ServiceState, number>> {
  const counts = emptyStateCounts(lifecycle);
  for (const token of tokens) {
    counts[token.state] = (counts[token.state] ?? 0) + 1;
  }
  return counts;
}

export function toOwnedRecord(token: ServiceToken): OwnedServiceRecord {
  return {
    id: token.id,
    state: token.state,
    companion: token.companion,
    evidenceFor: token.evidenceFor,
  };
}

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

export function computeOwnerStats(
  lifecycle: Lifecycle,
  owner: string,
  owned: readonly ServiceToken[],
): OwnerStatsRecord {
  const services = owned.filter((t) => !isEvidenceToken(t));
  const byState = countByState(lifecycle, services);

  return {
    owner,
    total: services.length,
    byState,
    evidenceHeld: owned.length - services.length,
    completionRate: percentage(byState[lifecycle.terminal] ?? 0, services.length),
  };
}

export function computeRegistrySummary(
  lifecycle: Lifecycle,
  tokens: readonly ServiceToken[],
  totalMinted: number,
): RegistrySummaryRecord {
  const services = tokens.filter((t) => !isEvidenceToken(t));
  const byState = countByState(lifecycle, services);

  const terminal = byState[lifecycle.terminal] ?? 0;
  const unassigned = byState[lifecycle.initial] ?? 0;

  return {
    lifecycle: lifecycle.name,
    totalMinted,
    totalServices: services.length,
    evidenceMinted: tokens.length - services.length,
    byState,
    completionRate: percentage(terminal, services.length),
    assignmentRate: percentage(services.length - unassigned, services.length),
    inProgress: services.length - terminal,
  };
}
