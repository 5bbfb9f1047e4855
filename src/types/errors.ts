/**
 * Failure taxonomy shared by the cache components and the HTTP front end.
 */

export const ErrorKind = {
  /** Remote resource absent (404) or local object not found */
  NotFound: 'not_found',
  /** Network/HTTP error or timeout that survived the retry policy */
  TransientFailure: 'transient_failure',
  /** Local disk or database I/O error */
  StorageFailure: 'storage_failure',
  /** An optional capability the user has not enabled */
  FeatureDisabled: 'feature_disabled',
  /** Malformed request body from the front end */
  InvalidRequest: 'invalid_request',
} as const;
export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface Failure {
  readonly kind: ErrorKind;
  readonly message: string;
  /** Operation that failed, for storage failures */
  readonly operation?: string | undefined;
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Failure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string, operation?: string): Result<T> {
  return { ok: false, error: { kind, message, operation } };
}

/** HTTP status the front end answers with for each failure kind */
export const HTTP_STATUS_BY_ERROR: Readonly<Record<ErrorKind, number>> = {
  [ErrorKind.NotFound]: 404,
  [ErrorKind.FeatureDisabled]: 404,
  [ErrorKind.InvalidRequest]: 400,
  [ErrorKind.TransientFailure]: 500,
  [ErrorKind.StorageFailure]: 500,
};
