/**
 * HTTP client with User-Agent, per-request deadline, gzip, and streamed downloads.
 * Rate limiting and retries are applied one level up, in the remote client.
 */
import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm, stat } from 'node:fs/promises';
import {
  type IncomingHttpHeaders,
  type IncomingMessage,
  type RequestOptions,
  request as httpRequest,
} from 'node:http';
import { request as httpsRequest } from 'node:https';
import { dirname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { gunzipSync } from 'node:zlib';
import type { DownloadOutcome, HttpGetOptions, HttpResponse } from '@shared/api';
import { DEFAULT_USER_AGENT, PARTIAL_SUFFIX } from '@shared/file-format';
import { createLogger } from '../logger';

const logger = createLogger('http-client');

/** The two primitives the remote client needs; replaced by stand-ins in tests. */
export interface HttpTransport {
  get(url: string, options: HttpGetOptions): Promise<HttpResponse>;
  download(url: string, destPath: string, options: HttpGetOptions): Promise<DownloadOutcome>;
}

interface OpenResponse {
  readonly res: IncomingMessage;
  /** Clears the request deadline */
  readonly done: () => void;
}

let partSequence = 0;

function headersToRecord(headers: IncomingHttpHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result[key] = Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return result;
}

/**
 * Send a GET and resolve once response headers arrive.
 * The deadline keeps running until done() is called, so it also bounds the body read.
 */
function openResponse(url: string, options: HttpGetOptions): Promise<OpenResponse> {
  return new Promise((resolve, reject) => {
    const headers: Record<string, string> = { 'User-Agent': DEFAULT_USER_AGENT };
    if (options.acceptGzip !== false) {
      headers['Accept-Encoding'] = 'gzip';
    }

    const requestOptions: RequestOptions = { method: 'GET', headers };
    if (options.agent !== undefined) {
      requestOptions.agent = options.agent;
    }

    let response: IncomingMessage | undefined;
    const onResponse = (res: IncomingMessage): void => {
      response = res;
      resolve({
        res,
        done: () => {
          clearTimeout(timer);
        },
      });
    };

    const req =
      new URL(url).protocol === 'https:'
        ? httpsRequest(url, requestOptions, onResponse)
        : httpRequest(url, requestOptions, onResponse);

    // Armed only once the request exists, so a synchronous throw above leaves no timer behind
    const timer = setTimeout(() => {
      const err = new Error(`Request timeout after ${String(options.timeoutMs)}ms`);
      response?.destroy(err);
      req.destroy(err);
    }, options.timeoutMs);

    req.on('error', (err: Error) => {
      clearTimeout(timer);
      reject(err);
    });
    req.end();
  });
}

function readBody(res: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    res.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    res.on('end', () => {
      resolve(Buffer.concat(chunks));
    });
    res.on('error', (err: Error) => {
      reject(err);
    });
  });
}

/**
 * Execute a single GET and buffer the body.
 * Rejects on network error, timeout or an undecodable gzip body; HTTP error statuses resolve.
 */
export async function httpGet(url: string, options: HttpGetOptions): Promise<HttpResponse> {
  const { res, done } = await openResponse(url, options);
  try {
    let body = await readBody(res);
    if (res.headers['content-encoding'] === 'gzip') {
      body = gunzipSync(body);
    }
    return {
      status: res.statusCode ?? 0,
      headers: headersToRecord(res.headers),
      body,
    };
  } finally {
    done();
  }
}

async function removePartial(partPath: string): Promise<void> {
  try {
    await rm(partPath, { force: true });
  } catch (err) {
    logger.warn(
      `Failed to remove partial download ${partPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Stream a GET body into destPath.
 * The body is written to a unique sibling ".part" file and renamed onto destPath only
 * after the whole body arrived with status 200. On any failure the partial file is removed.
 */
export async function httpDownload(
  url: string,
  destPath: string,
  options: HttpGetOptions,
): Promise<DownloadOutcome> {
  await mkdir(dirname(destPath), { recursive: true });
  partSequence += 1;
  const partPath = `${destPath}.${String(Date.now())}-${String(partSequence)}${PARTIAL_SUFFIX}`;

  const { res, done } = await openResponse(url, { ...options, acceptGzip: false });
  try {
    const status = res.statusCode ?? 0;
    if (status !== 200) {
      res.resume();
      return { status, bytes: 0 };
    }
    await pipeline(res, createWriteStream(partPath));
    await rename(partPath, destPath);
    const info = await stat(destPath);
    return { status, bytes: info.size };
  } catch (err) {
    await removePartial(partPath);
    throw err;
  } finally {
    done();
  }
}

export const defaultTransport: HttpTransport = {
  get: httpGet,
  download: httpDownload,
};
