import { describe, it, expect, beforeEach } from 'vitest';
import { ServiceRegistry } from '@core/registry';
import { expectFailure, expectOk, openGate, ScriptedLedger, tick } from './helpers';

describe('ServiceRegistry (simplified lifecycle)', () => {
  let ledger: ScriptedLedger;
  let registry: ServiceRegistry;

  beforeEach(() => {
    ledger = new ScriptedLedger();
    registry = new ServiceRegistry({ lifecycle: 'simplified', ledger });
  });

  describe('assignCompanion', () => {
    it('transfers ownership and matches in one step', async () => {
      expectOk(await registry.createService('client-a'));
      const assigned = expectOk(await registry.assignCompanion(0, 'companion-b'));

      expect(assigned.state).toBe('Matched');
      expect(assigned.transition).toMatchObject({ fromState: 'Created', toState: 'Matched' });
      expect(assigned.events).toEqual([
        { type: 'COMPANION_ASSIGNED', tokenId: 0, companion: 'companion-b' },
        { type: 'OWNERSHIP_TRANSFERRED', tokenId: 0, from: 'client-a', to: 'companion-b' },
        { type: 'STATE_CHANGED', tokenId: 0, fromState: 'Created', toState: 'Matched', rating: null },
      ]);
      expect(expectOk(await registry.ownerOf(0))).toBe('companion-b');
      expect(expectOk(await registry.companionOf(0))).toBe('companion-b');
    });

    it('cannot assign twice', async () => {
      expectOk(await registry.createService('client-a'));
      expectOk(await registry.assignCompanion(0, 'companion-b'));

      const message = expectFailure(
        await registry.assignCompanion(0, 'companion-c'),
        'InvalidTransition',
      );
      expect(message).toBe("Transition 'Matched' -> 'Matched' is not allowed; expected 'Finished'");
      expect(expectOk(await registry.companionOf(0))).toBe('companion-b');
      expect(expectOk(await registry.ownerOf(0))).toBe('companion-b');
    });

    it('changes nothing when the transfer fails', async () => {
      expectOk(await registry.createService('client-a'));
      ledger.failTransfer = true;

      const message = expectFailure(
        await registry.assignCompanion(0, 'companion-b'),
        'TransferFailed',
      );
      expect(message).toBe('Ledger rejected transfer of token 0: ledger offline');
      expect(expectOk(await registry.getService(0))).toMatchObject({
        owner: 'client-a',
        state: 'Created',
        companion: null,
      });
    });

    it('is observed as a whole by concurrent readers', async () => {
      expectOk(await registry.createService('client-a'));
      const release = openGate(ledger);

      const assigning = registry.assignCompanion(0, 'companion-b');
      const reading = registry.getService(0);
      let settled = false;
      void reading.then(() => {
        settled = true;
      });

      await tick();
      expect(settled).toBe(false);

      release();
      expectOk(await assigning);
      expect(expectOk(await reading)).toMatchObject({
        owner: 'companion-b',
        state: 'Matched',
        companion: 'companion-b',
      });
    });

    it('picks up the Matched URI', async () => {
      expectOk(await registry.configureStateURI('Matched', 'ipfs://matched'));
      expectOk(await registry.createService('client-a'));
      expectOk(await registry.assignCompanion(0, 'companion-b'));
      expect(expectOk(await registry.uriOf(0))).toBe('ipfs://matched');
    });
  });

  describe('changeState / finalizeService', () => {
    it('does not match through changeState', async () => {
      expectOk(await registry.createService('client-a'));
      const message = expectFailure(await registry.changeState(0, 'Matched'), 'InvalidTransition');
      expect(message).toBe("'Matched' is reached through assignCompanion, not changeState");
    });

    it('finishes a matched service', async () => {
      expectOk(await registry.createService('client-a'));
      expectOk(await registry.assignCompanion(0, 'companion-b'));
      const finished = expectOk(await registry.finalizeService(0));
      expect(finished).toMatchObject({ fromState: 'Matched', toState: 'Finished', evidenceId: null });
      expect(expectOk(await registry.ownerOf(0))).toBe('companion-b');
    });

    it('finishes through changeState by ordinal', async () => {
      expectOk(await registry.createService('client-a'));
      expectOk(await registry.assignCompanion(0, 'companion-b'));
      expectOk(await registry.changeState(0, 3));
      expect(expectOk(await registry.stateOf(0))).toBe('Finished');
    });

    it('refuses to finish an unmatched service', async () => {
      expectOk(await registry.createService('client-a'));
      const message = expectFailure(await registry.finalizeService(0), 'InvalidTransition');
      expect(message).toBe("Transition 'Created' -> 'Finished' is not allowed; expected 'Matched'");
    });

    it('has no rated or paid states', async () => {
      expectOk(await registry.createService('client-a'));
      expectFailure(await registry.changeState(0, 'Rated', 5), 'InvalidTransition');
      expect(expectFailure(await registry.markPaid(0), 'InvalidTransition')).toBe(
        'markPaid is not available in the simplified lifecycle',
      );
    });

    it('reports NotFound for an unknown id', async () => {
      expectFailure(await registry.finalizeService(4), 'NotFound');
    });
  });

  describe('owner statistics', () => {
    beforeEach(async () => {
      expectOk(await registry.createService('wallet-w'));
      for (let i = 0; i < 3; i += 1) {
        const { tokenId } = expectOk(await registry.createService('client-a'));
        expectOk(await registry.assignCompanion(tokenId, 'wallet-w'));
      }
      expectOk(await registry.finalizeService(3));
    });

    it('counts every service the wallet holds by state', async () => {
      expect(expectOk(await registry.statsByOwner('wallet-w'))).toEqual({
        owner: 'wallet-w',
        total: 4,
        byState: { Created: 1, Matched: 2, Finished: 1 },
        evidenceHeld: 0,
        completionRate: 25,
      });
    });

    it('lists the wallet tokens in id order', async () => {
      const owned = expectOk(await registry.listByOwner('wallet-w'));
      expect(owned.map((record) => record.id)).toEqual([0, 1, 2, 3]);
    });

    it('reports zero for a wallet that transferred everything away', async () => {
      expect(expectOk(await registry.statsByOwner('client-a'))).toMatchObject({
        total: 0,
        completionRate: 0,
      });
    });

    it('summarises the registry', async () => {
      expect(await registry.summary()).toEqual({
        lifecycle: 'simplified',
        totalMinted: 4,
        totalServices: 4,
        evidenceMinted: 0,
        byState: { Created: 1, Matched: 2, Finished: 1 },
        completionRate: 25,
        assignmentRate: 75,
        inProgress: 3,
      });
    });
  });
});
