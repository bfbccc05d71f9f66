import { ApiError } from './errors.js';

/**
 * Result variants for read operations.
 *
 * `empty` is a legitimate answer, not a failure: a panel with no members,
 * or the survey document requested with a token the platform refuses.
 */

export type EmptyReason = 'no-content' | 'unauthorized';

export interface Data<T> {
  kind: 'data';
  data: T;
}

export interface Empty {
  kind: 'empty';
  reason: EmptyReason;
}

export interface Failure {
  kind: 'error';
  error: ApiError;
}

export type Outcome<T> = Data<T> | Empty;

export type Result<T> = Outcome<T> | Failure;

export function data<T>(value: T): Data<T> {
  return { kind: 'data', data: value };
}

export function empty(reason: EmptyReason): Empty {
  return { kind: 'empty', reason };
}

export function isEmpty<T>(outcome: Outcome<T>): outcome is Empty {
  return outcome.kind === 'empty';
}

/** The data of an outcome, or `fallback` when it is empty. */
export function unwrapOr<T, D>(outcome: Outcome<T>, fallback: D): T | D {
  return outcome.kind === 'data' ? outcome.data : fallback;
}

/**
 * Folds a pending outcome and its gateway errors into one value.
 * Anything that is not an ApiError is a bug and is rethrown.
 */
export async function settle<T>(pending: Promise<Outcome<T>>): Promise<Result<T>> {
  try {
    return await pending;
  } catch (err) {
    if (err instanceof ApiError) {
      return { kind: 'error', error: err };
    }
    throw err;
  }
}
