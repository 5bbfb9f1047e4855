/**
 * HTTP communication types.
 */
import type { Agent } from 'node:http';

/** Options for a single outbound GET */
export interface HttpGetOptions {
  /** Whole-request deadline in ms (connect + read) */
  readonly timeoutMs: number;
  /** Whether to send Accept-Encoding: gzip */
  readonly acceptGzip?: boolean | undefined;
  /** Proxy agent, when outbound traffic goes through a proxy */
  readonly agent?: Agent | undefined;
}

/** HTTP response */
export interface HttpResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
}

/** Outcome of a streamed download. The destination only exists when status is 200. */
export interface DownloadOutcome {
  readonly status: number;
  readonly bytes: number;
}

/** Retry configuration for the remote client */
export interface RetryConfig {
  /** Total attempts per logical fetch (first try included) */
  readonly maxAttempts: number;
  /** Fixed pause between attempts in ms */
  readonly delayMs: number;
}

/** Per-call timeouts in ms */
export interface RequestTimeouts {
  readonly jsonMs: number;
  readonly downloadMs: number;
  readonly healthMs: number;
}

/** Result status of a remote fetch */
export const FetchStatus = {
  Ok: 'ok',
  /** Remote answered 404; never retried */
  NotFound: 'not_found',
  /** Network error, timeout or non-404 HTTP error after all attempts */
  Failed: 'failed',
} as const;
export type FetchStatus = (typeof FetchStatus)[keyof typeof FetchStatus];

export type FetchResult<T> =
  | { readonly status: typeof FetchStatus.Ok; readonly data: T }
  | { readonly status: typeof FetchStatus.NotFound }
  | { readonly status: typeof FetchStatus.Failed; readonly errorMessage: string };
