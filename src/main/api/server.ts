/**
 * HTTP front end.
 * A node:http server over a typed route table; every route resolves to one API channel.
 * Failures map to status codes by ErrorKind; anything unexpected is a 500.
 */
import { createReadStream } from 'node:fs';
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http';
import type { AddressInfo } from 'node:net';
import { basename, extname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { z } from 'zod';
import { ErrorKind, fail, HTTP_STATUS_BY_ERROR, ok, type Failure, type Result } from '@shared/errors';
import {
  ReplyKind,
  type ApiChannel,
  type ApiChannelMap,
  type HttpMethod,
} from '@shared/routes';
import {
  BoardCodeSchema,
  FilterIdBodySchema,
  FilterImportSchema,
  HistoryListSchema,
  MediaFilenameSchema,
  SettingsPatchSchema,
  ThreadFilterInputSchema,
  ThreadFilterPatchSchema,
} from '@shared/zod-schemas';
import { createLogger, toError } from '../logger';
import type { ApiHandler, ApiHandlers } from './handlers';

const logger = createLogger('server');

/** Request bodies larger than this are rejected */
const MAX_BODY_BYTES = 1024 * 1024;

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.webm': 'video/webm',
  '.mp4': 'video/mp4',
  '.pdf': 'application/pdf',
};

export interface RouteContext {
  /** Named groups of the path pattern */
  readonly params: Readonly<Record<string, string | undefined>>;
  /** Parsed JSON body; undefined when there was none */
  readonly body: unknown;
}

interface RouteSpec<K extends ApiChannel> {
  readonly method: HttpMethod;
  readonly path: RegExp;
  readonly channel: K;
  readonly reply?: ReplyKind | undefined;
  readonly parse: (ctx: RouteContext) => Result<ApiChannelMap[K]['params']>;
}

export interface Route {
  readonly method: HttpMethod;
  readonly path: RegExp;
  readonly channel: ApiChannel;
  readonly reply: ReplyKind;
  invoke(handlers: ApiHandlers, ctx: RouteContext): Promise<Result<unknown>>;
}

function route<K extends ApiChannel>(spec: RouteSpec<K>): Route {
  return {
    method: spec.method,
    path: spec.path,
    channel: spec.channel,
    reply: spec.reply ?? ReplyKind.Json,
    invoke: async (handlers, ctx) => {
      const params = spec.parse(ctx);
      if (!params.ok) return params;
      const handler: ApiHandler<K> = handlers[spec.channel];
      return handler(...params.value);
    },
  };
}

// ---------------------------------------------------------------------------
// Parameter parsing
// ---------------------------------------------------------------------------

function args<T extends readonly unknown[]>(...values: T): Result<T> {
  return ok(values);
}

const noArgs = (): Result<[]> => args();

function boardParam(ctx: RouteContext): Result<string> {
  const parsed = BoardCodeSchema.safeParse(ctx.params['board']);
  return parsed.success ? ok(parsed.data) : fail(ErrorKind.NotFound, 'Invalid board code');
}

function idParam(ctx: RouteContext, name: string): Result<number> {
  const raw = ctx.params[name] ?? '';
  return /^\d+$/.test(raw) ? ok(Number(raw)) : fail(ErrorKind.NotFound, `Invalid ${name}`);
}

function filenameParam(ctx: RouteContext): Result<string> {
  const parsed = MediaFilenameSchema.safeParse(ctx.params['filename']);
  return parsed.success ? ok(parsed.data) : fail(ErrorKind.NotFound, 'Invalid filename');
}

function bodyOf<S extends z.ZodTypeAny>(ctx: RouteContext, schema: S): Result<z.infer<S>> {
  const parsed = schema.safeParse(ctx.body);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.') || '(body)').join(', ');
    return fail(ErrorKind.InvalidRequest, `Invalid request body: ${fields}`);
  }
  const data: z.infer<S> = parsed.data;
  return ok(data);
}

function boardAndFilename(ctx: RouteContext): Result<[board: string, filename: string]> {
  const board = boardParam(ctx);
  if (!board.ok) return board;
  const filename = filenameParam(ctx);
  if (!filename.ok) return filename;
  return args(board.value, filename.value);
}

function boardAndId(ctx: RouteContext, name: string): Result<[board: string, id: number]> {
  const board = boardParam(ctx);
  if (!board.ok) return board;
  const id = idParam(ctx, name);
  if (!id.ok) return id;
  return args(board.value, id.value);
}

// ---------------------------------------------------------------------------
// Route table
// ---------------------------------------------------------------------------

const BOARD = '(?<board>[^/]+)';

function path(pattern: string): RegExp {
  return new RegExp(`^${pattern}$`);
}

export const ROUTES: readonly Route[] = [
  route({ method: 'GET', path: path('/api/boards'), channel: 'boards:list', parse: noArgs }),
  route({
    method: 'GET',
    path: path(`/api/catalog/${BOARD}`),
    channel: 'catalog:get',
    parse: (ctx) => {
      const board = boardParam(ctx);
      return board.ok ? args(board.value) : board;
    },
  }),
  route({
    method: 'GET',
    path: path(`/api/thread/${BOARD}/(?<threadId>[^/]+)`),
    channel: 'thread:get',
    parse: (ctx) => boardAndId(ctx, 'threadId'),
  }),
  route({
    method: 'GET',
    path: path(`/api/image/${BOARD}/(?<filename>[^/]+)`),
    channel: 'media:get',
    reply: ReplyKind.File,
    parse: boardAndFilename,
  }),
  route({
    method: 'GET',
    path: path(`/api/download/${BOARD}/(?<filename>[^/]+)`),
    channel: 'media:download',
    reply: ReplyKind.Attachment,
    parse: boardAndFilename,
  }),

  route({ method: 'GET', path: path('/api/settings'), channel: 'settings:get', parse: noArgs }),
  route({
    method: 'POST',
    path: path('/api/settings'),
    channel: 'settings:save',
    parse: (ctx) => {
      const patch = bodyOf(ctx, SettingsPatchSchema);
      return patch.ok ? args(patch.value) : patch;
    },
  }),

  route({ method: 'GET', path: path('/api/history'), channel: 'history:get', parse: noArgs }),
  route({
    method: 'POST',
    path: path('/api/history'),
    channel: 'history:save',
    parse: (ctx) => {
      const entries = bodyOf(ctx, HistoryListSchema);
      return entries.ok ? args(entries.value) : entries;
    },
  }),
  route({ method: 'POST', path: path('/api/history/clear'), channel: 'history:clear', parse: noArgs }),
  route({
    method: 'DELETE',
    path: path(`/api/history/${BOARD}/(?<threadId>[^/]+)`),
    channel: 'history:remove',
    parse: (ctx) => boardAndId(ctx, 'threadId'),
  }),

  route({ method: 'GET', path: path('/api/filters'), channel: 'filters:all', parse: noArgs }),
  route({
    method: 'PUT',
    path: path('/api/filters'),
    channel: 'filters:import',
    parse: (ctx) => {
      const data = bodyOf(ctx, FilterImportSchema);
      return data.ok ? args(data.value) : data;
    },
  }),
  route({
    method: 'GET',
    path: path(`/api/filters/${BOARD}`),
    channel: 'filters:get',
    parse: (ctx) => {
      const board = boardParam(ctx);
      return board.ok ? args(board.value) : board;
    },
  }),
  route({
    method: 'POST',
    path: path(`/api/filters/${BOARD}`),
    channel: 'filters:add',
    parse: (ctx) => {
      const board = boardParam(ctx);
      if (!board.ok) return board;
      const input = bodyOf(ctx, ThreadFilterInputSchema);
      return input.ok ? args(board.value, input.value) : input;
    },
  }),
  route({
    method: 'DELETE',
    path: path(`/api/filters/${BOARD}`),
    channel: 'filters:remove',
    parse: (ctx) => {
      const board = boardParam(ctx);
      if (!board.ok) return board;
      const body = bodyOf(ctx, FilterIdBodySchema);
      return body.ok ? args(board.value, body.value.id) : body;
    },
  }),
  route({
    method: 'POST',
    path: path(`/api/filters/${BOARD}/clear`),
    channel: 'filters:clear',
    parse: (ctx) => {
      const board = boardParam(ctx);
      return board.ok ? args(board.value) : board;
    },
  }),
  route({
    method: 'PATCH',
    path: path(`/api/filters/${BOARD}/(?<filterId>[^/]+)`),
    channel: 'filters:update',
    parse: (ctx) => {
      const target = boardAndId(ctx, 'filterId');
      if (!target.ok) return target;
      const patch = bodyOf(ctx, ThreadFilterPatchSchema);
      if (!patch.ok) return patch;
      const [board, id] = target.value;
      return args(board, id, patch.value);
    },
  }),

  route({ method: 'POST', path: path('/api/cache/clear'), channel: 'cache:clear', parse: noArgs }),
  route({ method: 'GET', path: path('/api/cache/stats'), channel: 'cache:stats', parse: noArgs }),
  route({ method: 'GET', path: path('/api/health'), channel: 'app:health', parse: noArgs }),
  route({ method: 'GET', path: path('/api/logs'), channel: 'app:logs', parse: noArgs }),
];

// ---------------------------------------------------------------------------
// Request / response plumbing
// ---------------------------------------------------------------------------

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

function sendJson(res: ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

function sendFailure(res: ServerResponse, failure: Failure): void {
  sendJson(res, HTTP_STATUS_BY_ERROR[failure.kind], { error: failure.message });
}

/**
 * Read and parse a JSON request body. An empty body parses to undefined.
 */
function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size <= MAX_BODY_BYTES) {
        chunks.push(chunk);
      }
    });
    req.on('end', () => {
      if (size > MAX_BODY_BYTES) {
        reject(new HttpError(413, 'Request body too large'));
        return;
      }
      const text = Buffer.concat(chunks).toString('utf-8');
      if (text.trim().length === 0) {
        resolve(undefined);
        return;
      }
      try {
        const parsed: unknown = JSON.parse(text);
        resolve(parsed);
      } catch {
        reject(new HttpError(400, 'Invalid JSON'));
      }
    });
    req.on('error', (err: Error) => {
      reject(err);
    });
  });
}

async function sendFile(res: ServerResponse, filePath: string, attachment: boolean): Promise<void> {
  const headers: Record<string, string> = {
    'Content-Type': CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream',
  };
  if (attachment) {
    headers['Content-Disposition'] = `attachment; filename="${basename(filePath)}"`;
  }
  const stream = createReadStream(filePath);
  // Surface open errors before committing to a 200
  try {
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => {
        resolve();
      });
      stream.once('error', reject);
    });
  } catch (err) {
    stream.destroy();
    // Evicted between lookup and open
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new HttpError(404, 'Image not found');
    }
    throw err;
  }
  res.writeHead(200, headers);
  await pipeline(stream, res);
}

function isHttpMethod(method: string | undefined): method is HttpMethod {
  return (
    method === 'GET' ||
    method === 'POST' ||
    method === 'PUT' ||
    method === 'PATCH' ||
    method === 'DELETE'
  );
}

function matchRoute(
  routes: readonly Route[],
  method: HttpMethod,
  pathname: string,
): { route: Route; params: Record<string, string | undefined> } | 'method-not-allowed' | null {
  let pathMatched = false;
  for (const candidate of routes) {
    const match = candidate.path.exec(pathname);
    if (match === null) continue;
    pathMatched = true;
    if (candidate.method === method) {
      return { route: candidate, params: { ...match.groups } };
    }
  }
  return pathMatched ? 'method-not-allowed' : null;
}

/**
 * Handle one request against the route table.
 */
export async function handleRequest(
  routes: readonly Route[],
  handlers: ApiHandlers,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const { pathname } = new URL(req.url ?? '/', 'http://localhost');
  const method = req.method;
  if (!isHttpMethod(method)) {
    sendJson(res, 405, { error: 'Method not allowed' });
    return;
  }
  const matched = matchRoute(routes, method, pathname);
  if (matched === null) {
    sendJson(res, 404, { error: 'Endpoint not found' });
    return;
  }
  if (matched === 'method-not-allowed') {
    sendJson(res, 405, { error: 'Method not allowed' });
    return;
  }

  const { route: target, params } = matched;
  const body = method === 'GET' ? undefined : await readJsonBody(req);
  const result = await target.invoke(handlers, { params, body });
  if (!result.ok) {
    sendFailure(res, result.error);
    return;
  }
  if (target.reply === ReplyKind.Json) {
    sendJson(res, 200, result.value);
    return;
  }
  if (typeof result.value !== 'string') {
    throw new Error(`Route ${target.channel} did not resolve to a file path`);
  }
  await sendFile(res, result.value, target.reply === ReplyKind.Attachment);
}

function replyToError(res: ServerResponse, err: unknown): void {
  if (err instanceof HttpError) {
    if (!res.headersSent) sendJson(res, err.status, { error: err.message });
    return;
  }
  logger.error('Unhandled request error', toError(err));
  if (res.headersSent) {
    res.destroy();
    return;
  }
  sendJson(res, 500, { error: 'Internal server error' });
}

export function createApiServer(handlers: ApiHandlers, routes: readonly Route[] = ROUTES): Server {
  return createServer((req, res) => {
    handleRequest(routes, handlers, req, res).catch((err: unknown) => {
      replyToError(res, err);
    });
  });
}

/**
 * Start listening. Resolves with the bound address (port 0 picks a free port).
 */
export function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      logger.info(`Listening on http://${address.address}:${String(address.port)}`);
      resolve(address);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err !== undefined) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
