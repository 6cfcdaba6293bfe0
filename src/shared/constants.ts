export const API_PREFIX = '/api';

export const LIFECYCLES = ['full', 'simplified'] as const;

export const FULL_SERVICE_STATES = [
  'Created',
  'Matched',
  'Completed',
  'Rated',
  'Paid',
] as const;

export const SIMPLE_SERVICE_STATES = ['Created', 'Matched', 'Finished'] as const;

export const SERVICE_STATES = [
  'Created',
  'Matched',
  'Completed',
  'Rated',
  'Paid',
  'Finished',
] as const;

export const EVENT_ACTIONS = [
  'SERVICE_CREATED',
  'COMPANION_ASSIGNED',
  'OWNERSHIP_TRANSFERRED',
  'STATE_CHANGED',
  'EVIDENCE_MINTED',
  'STATE_URI_CONFIGURED',
] as const;

export const ERROR_KINDS = [
  'NotFound',
  'InvalidArgument',
  'InvalidTransition',
  'InvalidRating',
  'PreconditionFailed',
  'TransferFailed',
] as const;

export const RATING_MIN = 1;
export const RATING_MAX = 5;

export const DEFAULT_COLLECTION = {
  name: 'Companion Service Tokens',
  symbol: 'CSNFT',
} as const;

export const DEFAULT_JOURNAL_LIMIT = 50;
