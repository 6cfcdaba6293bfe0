import type {
  ERROR_KINDS,
  EVENT_ACTIONS,
  LIFECYCLES,
  SERVICE_STATES,
} from './constants';

export type LifecycleName = (typeof LIFECYCLES)[number];
export type ServiceState = (typeof SERVICE_STATES)[number];
export type EventAction = (typeof EVENT_ACTIONS)[number];
export type RegistryErrorKind = (typeof ERROR_KINDS)[number];

export interface ServiceRecord {
  id: number;
  owner: string | null;
  state: ServiceState;
  ordinal: number;
  rating: number;
  companion: string | null;
  evidenceOf: number | null;
  evidenceFor: number | null;
  uri: string;
}

export interface OwnedServiceRecord {
  id: number;
  state: ServiceState;
  companion: string | null;
  evidenceFor: number | null;
}

export interface OwnerStatsRecord {
  owner: string;
  total: number;
  byState: Partial<Record<ServiceState, number>>;
  evidenceHeld: number;
  completionRate: number;
}

export interface RegistrySummaryRecord {
  lifecycle: LifecycleName;
  totalMinted: number;
  totalServices: number;
  evidenceMinted: number;
  byState: Partial<Record<ServiceState, number>>;
  completionRate: number;
  assignmentRate: number;
  inProgress: number;
}

export interface CollectionInfoRecord {
  name: string;
  symbol: string;
  lifecycle: LifecycleName;
  states: { name: ServiceState; ordinal: number }[];
  nextId: number;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  kind?: RegistryErrorKind;
}
