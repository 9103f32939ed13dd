/**
 * Typed result variant used inside connectors.
 *
 * Internal steps produce a Result; only the public boundary turns it into an
 * envelope with `settle`, so exceptions never form part of the external
 * contract.
 */

import { ConnectorError, wrapError, type ErrorCode } from '../errors/index.js';

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConnectorError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: ConnectorError): Result<T> {
  return { ok: false, error };
}

/**
 * Run `fn` and capture anything it throws as a failed result.
 * Non-connector errors are wrapped with `defaultCode`.
 */
export async function attempt<T>(
  fn: () => Promise<T>,
  defaultCode: ErrorCode = 'UNKNOWN'
): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(wrapError(error, defaultCode));
  }
}

/**
 * Chain a result-producing step after a successful result
 */
export async function andThen<T, U>(
  result: Result<T>,
  next: (value: T) => Promise<Result<U>>
): Promise<Result<U>> {
  if (!result.ok) {
    return err(result.error);
  }
  return next(result.value);
}

/**
 * Convert a result into its envelope shape
 */
export function settle<T, S, F>(
  result: Result<T>,
  onSuccess: (value: T) => S,
  onFailure: (message: string, error: ConnectorError) => F
): S | F {
  if (result.ok) {
    return onSuccess(result.value);
  }
  return onFailure(result.error.message, result.error);
}
