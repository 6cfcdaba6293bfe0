import type { RegistryErrorKind } from '@shared/types';

export interface RegistryFailure {
  kind: RegistryErrorKind;
  message: string;
}

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: RegistryFailure;
}

/** Result of a registry operation: it either fully applied or changed nothing. */
export type Outcome<T> = Success<T> | Failure;

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(kind: RegistryErrorKind, message: string): Failure {
  return { ok: false, error: { kind, message } };
}
