import { expect } from 'vitest';
import type { RegistryEvent } from '@core/events';
import { InMemoryEventJournal, type JournalEntry } from '@core/journal';
import { InMemoryOwnershipLedger, LedgerError } from '@core/ledger';
import type { Outcome } from '@core/outcome';
import type { RegistryErrorKind } from '@shared/types';

export function expectOk<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new Error(`Expected success, got ${outcome.error.kind}: ${outcome.error.message}`);
  }
  return outcome.value;
}

export function expectFailure<T>(outcome: Outcome<T>, kind: RegistryErrorKind): string {
  expect(outcome.ok).toBe(false);
  if (outcome.ok) throw new Error('Expected failure');
  expect(outcome.error.kind).toBe(kind);
  return outcome.error.message;
}

/** Ledger whose mints, transfers or burns can be made to fail or to wait. */
export class ScriptedLedger extends InMemoryOwnershipLedger {
  failMint = false;
  failTransfer = false;
  failBurn = false;
  gate: Promise<void> | null = null;

  async mint(owner: string, tokenId: number): Promise<void> {
    if (this.gate) await this.gate;
    if (this.failMint) throw new LedgerError('ledger offline');
    return super.mint(owner, tokenId);
  }

  async transfer(from: string, to: string, tokenId: number): Promise<void> {
    if (this.gate) await this.gate;
    if (this.failTransfer) throw new LedgerError('ledger offline');
    return super.transfer(from, to, tokenId);
  }

  async burn(owner: string, tokenId: number): Promise<void> {
    if (this.failBurn) throw new LedgerError('ledger offline');
    return super.burn(owner, tokenId);
  }
}

/** Journal that refuses appends while `failing` is set. */
export class FailingJournal extends InMemoryEventJournal {
  failing = true;

  async append(events: readonly RegistryEvent[]): Promise<JournalEntry[]> {
    if (this.failing) throw new Error('journal unavailable');
    return super.append(events);
  }
}

export function openGate(ledger: ScriptedLedger): () => void {
  let release: () => void = () => undefined;
  ledger.gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  return () => {
    ledger.gate = null;
    release();
  };
}

export function tick(ms = 10): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
