import type { ServiceState } from '@shared/types';

export interface ServiceToken {
  readonly id: number;
  readonly state: ServiceState;
  /** 0 unless the token sits in a rated state (or is an evidence record). */
  readonly rating: number;
  readonly companion: string | null;
  /** Evidence token minted for this service, once paid. */
  readonly evidenceOf: number | null;
  /** Service this evidence token was minted for. */
  readonly evidenceFor: number | null;
  readonly uri: string;
}

export function isEvidenceToken(token: ServiceToken): boolean {
  return token.evidenceFor !== null;
}
