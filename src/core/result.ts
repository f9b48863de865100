/**
 * Tagged result of a fallible computation
 *
 * Construction and the interval algebra return a Result instead of throwing,
 * so a chained expression reports the step that failed.
 */

import { AINError } from './errors';

export interface Ok<T> {
  readonly tag: 'Ok';
  readonly value: T;
}

export interface Err<E> {
  readonly tag: 'Err';
  readonly error: E;
}

export type Result<T, E = AINError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { tag: 'Ok', value };
}

export function err<E>(error: E): Err<E> {
  return { tag: 'Err', error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.tag === 'Err';
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.tag === 'Ok' ? ok(fn(result.value)) : result;
}

/**
 * Feed a successful value into the next fallible step
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.tag === 'Ok' ? fn(result.value) : result;
}

/**
 * Return the value or throw the carried error
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.tag === 'Err') {
    throw result.error;
  }
  return result.value;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.tag === 'Ok' ? result.value : fallback;
}
