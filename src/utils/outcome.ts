/**
 * Tagged result of a repository or retrieval call.
 *
 * A failure never carries a value, so "no questions stored for this subject"
 * (`ok` with an empty list) stays distinguishable from "the backend could not
 * be reached" (`connectivityError`).
 */
export type OutcomeFailureStatus = 'connectivityError' | 'dataError';

export interface OutcomeSuccess<T> {
  status: 'ok';
  value: T;
}

export interface OutcomeFailure {
  status: OutcomeFailureStatus;
  error: string;
}

export type Outcome<T> = OutcomeSuccess<T> | OutcomeFailure;

export function ok<T>(value: T): OutcomeSuccess<T> {
  return { status: 'ok', value };
}

export function connectivityError(error: string): OutcomeFailure {
  return { status: 'connectivityError', error };
}

export function dataError(error: string): OutcomeFailure {
  return { status: 'dataError', error };
}

export function isOk<T>(outcome: Outcome<T>): outcome is OutcomeSuccess<T> {
  return outcome.status === 'ok';
}

export function valueOr<T>(outcome: Outcome<T>, fallback: T): T {
  return outcome.status === 'ok' ? outcome.value : fallback;
}

// Number of questions a store call persisted; a failed batch persisted none.
export function storedCount(outcome: Outcome<number>): number {
  return valueOr(outcome, 0);
}
