/**
 * Tagged result of a dispatched request.
 * @module outcome
 */

import type { GitHubError } from './errors.js';

/**
 * Successful, decoded response.
 */
export interface Success<T> {
  readonly type: 'success';
  readonly value: T;
  readonly status: number;
  readonly headers: Headers;
}

/**
 * Failure tags: `github_error` for non-2xx responses with a decoded error
 * envelope, `transport_error` when no response arrived, `auth_error` when
 * no credential could be derived, `decode_error` when a 2xx body did not
 * match the expected shape.
 */
export type FailureType = 'github_error' | 'transport_error' | 'auth_error' | 'decode_error';

export interface Failure {
  readonly type: FailureType;
  readonly error: GitHubError;
}

export type Outcome<T> = Success<T> | Failure;

export function success<T>(value: T, status: number, headers: Headers): Success<T> {
  return { type: 'success', value, status, headers };
}

export function failure(type: FailureType, error: GitHubError): Failure {
  return { type, error };
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is Success<T> {
  return outcome.type === 'success';
}

/**
 * Returns the value or throws the outcome's error.
 */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (outcome.type === 'success') {
    return outcome.value;
  }
  throw outcome.error;
}
