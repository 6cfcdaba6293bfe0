import type { EventAction, ServiceState } from '@shared/types';

export type RegistryEvent =
  | { type: 'SERVICE_CREATED'; tokenId: number; owner: string }
  | { type: 'COMPANION_ASSIGNED'; tokenId: number; companion: string }
  | { type: 'OWNERSHIP_TRANSFERRED'; tokenId: number; from: string; to: string }
  | {
      type: 'STATE_CHANGED';
      tokenId: number;
      fromState: ServiceState;
      toState: ServiceState;
      rating: number | null;
    }
  | {
      type: 'EVIDENCE_MINTED';
      tokenId: number;
      evidenceId: number;
      companion: string;
      rating: number;
    }
  | { type: 'STATE_URI_CONFIGURED'; state: ServiceState; uri: string };

/** Token an event is about, or null for registry-wide configuration. */
export function eventTokenId(event: RegistryEvent): number | null {
  return event.type === 'STATE_URI_CONFIGURED' ? null : event.tokenId;
}

export function eventAction(event: RegistryEvent): EventAction {
  return event.type;
}
