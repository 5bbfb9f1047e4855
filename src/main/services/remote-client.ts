/**
 * Read-only client for the remote imageboard API.
 * Every request passes the shared rate limiter; transient failures are retried with a
 * fixed pause, 404 short-circuits to NotFound. Failures resolve to values, never throw.
 */
import type { Agent as HttpAgent } from 'node:http';
import type { z } from 'zod';
import {
  FetchStatus,
  type FetchResult,
  type HttpGetOptions,
  type RequestTimeouts,
  type RetryConfig,
} from '@shared/api';
import type { Endpoints } from '@shared/config';
import { THUMBNAIL_SUFFIX } from '@shared/file-format';
import {
  BoardsResponseSchema,
  CatalogResponseSchema,
  ThreadPayloadSchema,
  type CatalogThread,
  type RemoteBoard,
  type ThreadPayload,
} from '@shared/zod-schemas';
import { createLogger } from '../logger';
import { defaultTransport, type HttpTransport } from './http-client';
import type { RateLimiter } from './rate-limiter';

const logger = createLogger('remote-client');

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface RemoteClientOptions {
  readonly endpoints: Endpoints;
  readonly retry: RetryConfig;
  readonly timeouts: RequestTimeouts;
  readonly limiter: RateLimiter;
  readonly transport?: HttpTransport | undefined;
  readonly agent?: HttpAgent | undefined;
}

export class RemoteClient {
  private readonly endpoints: Endpoints;
  private readonly retry: RetryConfig;
  private readonly timeouts: RequestTimeouts;
  private readonly limiter: RateLimiter;
  private readonly transport: HttpTransport;
  private readonly agent: HttpAgent | undefined;

  constructor(options: RemoteClientOptions) {
    this.endpoints = options.endpoints;
    this.retry = options.retry;
    this.timeouts = options.timeouts;
    this.limiter = options.limiter;
    this.transport = options.transport ?? defaultTransport;
    this.agent = options.agent;
  }

  // -------------------------------------------------------------------------
  // Endpoint templates
  // -------------------------------------------------------------------------

  boardsUrl(): string {
    return `${this.endpoints.apiBaseUrl}/boards.json`;
  }

  catalogUrl(board: string): string {
    return `${this.endpoints.apiBaseUrl}/${encodeURIComponent(board)}/catalog.json`;
  }

  threadUrl(board: string, threadId: number): string {
    return `${this.endpoints.apiBaseUrl}/${encodeURIComponent(board)}/thread/${String(threadId)}.json`;
  }

  imageUrl(board: string, objectId: string, ext: string): string {
    return `${this.endpoints.mediaBaseUrl}/${encodeURIComponent(board)}/${objectId}${ext}`;
  }

  thumbnailUrl(board: string, objectId: string): string {
    return `${this.endpoints.mediaBaseUrl}/${encodeURIComponent(board)}/${objectId}${THUMBNAIL_SUFFIX}`;
  }

  // -------------------------------------------------------------------------
  // Fetches
  // -------------------------------------------------------------------------

  private requestOptions(timeoutMs: number): HttpGetOptions {
    return { timeoutMs, agent: this.agent };
  }

  private async pauseBeforeRetry(url: string, attempt: number, reason: string): Promise<void> {
    logger.warn(
      `Request failed for ${url} (attempt ${String(attempt)}/${String(this.retry.maxAttempts)}): ${reason}, retrying in ${String(this.retry.delayMs)}ms`,
    );
    await sleep(this.retry.delayMs);
  }

  /**
   * GET a JSON document.
   */
  async fetchJson(url: string): Promise<FetchResult<unknown>> {
    let lastError = 'no attempt made';
    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      await this.limiter.wait();
      try {
        const response = await this.transport.get(url, this.requestOptions(this.timeouts.jsonMs));
        if (response.status === 404) {
          logger.info(`Not found: ${url}`);
          return { status: FetchStatus.NotFound };
        }
        if (response.status === 200) {
          const data: unknown = JSON.parse(response.body.toString('utf-8'));
          return { status: FetchStatus.Ok, data };
        }
        lastError = `HTTP ${String(response.status)}`;
      } catch (err) {
        lastError = describeError(err);
      }
      if (attempt < this.retry.maxAttempts) {
        await this.pauseBeforeRetry(url, attempt, lastError);
      }
    }
    logger.error(
      `Giving up on ${url} after ${String(this.retry.maxAttempts)} attempts: ${lastError}`,
    );
    return { status: FetchStatus.Failed, errorMessage: lastError };
  }

  private async fetchValidated<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
  ): Promise<FetchResult<z.infer<S>>> {
    const result = await this.fetchJson(url);
    if (result.status !== FetchStatus.Ok) return result;
    const parsed = schema.safeParse(result.data);
    if (!parsed.success) {
      logger.warn(`Unexpected payload from ${url}: ${parsed.error.message}`);
      return { status: FetchStatus.Failed, errorMessage: `Unexpected payload from ${url}` };
    }
    const data: z.infer<S> = parsed.data;
    return { status: FetchStatus.Ok, data };
  }

  async fetchBoards(): Promise<FetchResult<readonly RemoteBoard[]>> {
    const result = await this.fetchValidated(this.boardsUrl(), BoardsResponseSchema);
    if (result.status !== FetchStatus.Ok) return result;
    return { status: FetchStatus.Ok, data: result.data.boards };
  }

  /**
   * Fetch a catalog and flatten its pages into one thread list.
   */
  async fetchCatalog(board: string): Promise<FetchResult<readonly CatalogThread[]>> {
    const result = await this.fetchValidated(this.catalogUrl(board), CatalogResponseSchema);
    if (result.status !== FetchStatus.Ok) return result;
    return { status: FetchStatus.Ok, data: result.data.flatMap((page) => page.threads) };
  }

  async fetchThread(board: string, threadId: number): Promise<FetchResult<ThreadPayload>> {
    return this.fetchValidated(this.threadUrl(board, threadId), ThreadPayloadSchema);
  }

  /**
   * Download a binary body to destPath. Resolves false on any failure;
   * the destination never holds a partial file.
   */
  async downloadBinary(url: string, destPath: string): Promise<boolean> {
    let lastError = 'no attempt made';
    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      await this.limiter.wait();
      try {
        const outcome = await this.transport.download(
          url,
          destPath,
          this.requestOptions(this.timeouts.downloadMs),
        );
        if (outcome.status === 200) {
          return true;
        }
        if (outcome.status === 404) {
          logger.warn(`Download not found: ${url}`);
          return false;
        }
        lastError = `HTTP ${String(outcome.status)}`;
      } catch (err) {
        lastError = describeError(err);
      }
      if (attempt < this.retry.maxAttempts) {
        await this.pauseBeforeRetry(url, attempt, lastError);
      }
    }
    logger.error(`Download failed: ${url} - ${lastError}`);
    return false;
  }

  /**
   * Probe the board list endpoint. Never throws.
   */
  async checkHealth(): Promise<boolean> {
    try {
      await this.limiter.wait();
      const response = await this.transport.get(
        this.boardsUrl(),
        this.requestOptions(this.timeouts.healthMs),
      );
      return response.status === 200;
    } catch (err) {
      logger.warn(`Health check failed: ${describeError(err)}`);
      return false;
    }
  }
}
