import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { HttpResponse } from '../../src/types/api';
import { ok } from '../../src/types/errors';
import { createApp, type App } from '../../src/main/app';
import { loadConfig } from '../../src/main/config';
import type { HttpTransport } from '../../src/main/services/http-client';

function jsonResponse(status: number, data: unknown): HttpResponse {
  return { status, headers: {}, body: Buffer.from(JSON.stringify(data)) };
}

const remoteData = new Map<string, HttpResponse>([
  [
    'http://api.test/boards.json',
    jsonResponse(200, { boards: [{ board: 'g', title: 'Technology', ws_board: 1 }] }),
  ],
  [
    'http://api.test/g/thread/123.json',
    jsonResponse(200, { posts: [{ no: 123, sub: 'Hello', com: 'first' }] }),
  ],
]);

const transport: HttpTransport = {
  get: async (url) => remoteData.get(url) ?? jsonResponse(404, {}),
  download: async (_url, destPath) => {
    mkdirSync(dirname(destPath), { recursive: true });
    writeFileSync(destPath, 'img');
    return { status: 200, bytes: 3 };
  },
};

let dir: string;
let app: App;
let baseUrl: string;

beforeEach(async () => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  dir = mkdtempSync(join(tmpdir(), 'server-'));
  const config = loadConfig({
    DATA_DIR: dir,
    PORT: '0',
    MAX_RETRIES: '1',
    RETRY_DELAY: '0',
    RATE_LIMIT_INTERVAL: '0',
    API_BASE_URL: 'http://api.test',
    MEDIA_BASE_URL: 'http://media.test',
  });
  app = await createApp(config, { transport });
  const address = await app.start();
  baseUrl = `http://127.0.0.1:${String(address.port)}`;
});

afterEach(async () => {
  await app.shutdown();
  rmSync(dir, { recursive: true, force: true });
});

async function call(
  method: string,
  path: string,
  body?: string,
): Promise<{ status: number; json: unknown }> {
  const init: RequestInit = { method };
  if (body !== undefined) {
    init.body = body;
    init.headers = { 'Content-Type': 'application/json' };
  }
  const response = await fetch(`${baseUrl}${path}`, init);
  const json: unknown = await response.json();
  return { status: response.status, json };
}

describe('routing', () => {
  it('answers unknown paths with 404', async () => {
    expect(await call('GET', '/api/nothing')).toEqual({
      status: 404,
      json: { error: 'Endpoint not found' },
    });
  });

  it('answers a known path with the wrong method with 405', async () => {
    expect(await call('DELETE', '/api/boards')).toEqual({
      status: 405,
      json: { error: 'Method not allowed' },
    });
  });

  it('rejects invalid board codes and ids', async () => {
    expect(await call('GET', '/api/catalog/Not-A-Board')).toEqual({
      status: 404,
      json: { error: 'Invalid board code' },
    });
    expect(await call('GET', '/api/thread/g/abc')).toEqual({
      status: 404,
      json: { error: 'Invalid threadId' },
    });
  });
});

describe('metadata routes', () => {
  it('serves the board list', async () => {
    const { status, json } = await call('GET', '/api/boards');
    expect(status).toBe(200);
    expect(json).toEqual([
      { code: 'g', title: 'Technology', isWorksafe: true, fetchedAt: expect.any(Number) },
    ]);
  });

  it('serves a thread and records it in history', async () => {
    expect(await call('GET', '/api/thread/g/123')).toEqual({
      status: 200,
      json: { posts: [{ no: 123, sub: 'Hello', com: 'first' }] },
    });

    const history = await call('GET', '/api/history');
    expect(history.json).toEqual([
      { board: 'g', threadId: 123, title: 'Hello', visitedAt: expect.any(String) },
    ]);

    expect(await call('DELETE', '/api/history/g/123')).toEqual({
      status: 200,
      json: { status: 'removed' },
    });
    expect(await call('DELETE', '/api/history/g/123')).toEqual({
      status: 404,
      json: { error: 'History entry not found' },
    });
  });

  it('maps a missing thread to 404', async () => {
    expect(await call('GET', '/api/thread/g/999')).toEqual({
      status: 404,
      json: { error: 'Thread not found' },
    });
  });
});

describe('media routes', () => {
  it('streams a cached thumbnail with its content type', async () => {
    const response = await fetch(`${baseUrl}/api/image/g/1700000000000s.jpg`);
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('image/jpeg');
    expect(await response.text()).toBe('img');
  });

  it('answers 404 when the file vanishes before it is opened', async () => {
    vi.spyOn(app.orchestrator, 'getMedia').mockResolvedValue(ok(join(dir, 'evicted.png')));
    expect(await call('GET', '/api/image/g/1700000000000.png')).toEqual({
      status: 404,
      json: { error: 'Image not found' },
    });
  });

  it('rejects malformed media names', async () => {
    expect(await call('GET', '/api/image/g/evil.sh')).toEqual({
      status: 404,
      json: { error: 'Invalid filename' },
    });
  });

  it('refuses downloads until enabled, then sends an attachment', async () => {
    expect(await call('GET', '/api/download/g/42.png')).toEqual({
      status: 404,
      json: { error: 'Downloads disabled' },
    });

    await call('POST', '/api/settings', JSON.stringify({ enableDownloadButton: true }));
    const response = await fetch(`${baseUrl}/api/download/g/42.png`);
    expect(response.status).toBe(200);
    expect(response.headers.get('content-disposition')).toBe('attachment; filename="42.png"');
    expect(await response.text()).toBe('img');
  });
});

describe('settings routes', () => {
  it('saves a partial update', async () => {
    expect(await call('POST', '/api/settings', JSON.stringify({ autoRefresh: true }))).toEqual({
      status: 200,
      json: { status: 'saved' },
    });
    const { json } = await call('GET', '/api/settings');
    expect(json).toMatchObject({ autoRefresh: true, theme: 'dark' });
  });

  it('answers invalid bodies with 400', async () => {
    expect(await call('POST', '/api/settings', JSON.stringify({ theme: 'neon' }))).toEqual({
      status: 400,
      json: { error: 'Invalid request body: theme' },
    });
    expect(await call('POST', '/api/settings', '{')).toEqual({
      status: 400,
      json: { error: 'Invalid JSON' },
    });
  });
});

describe('filter routes', () => {
  it('adds, updates and removes a filter', async () => {
    expect(await call('POST', '/api/filters/g', JSON.stringify({ keyword: 'spam' }))).toEqual({
      status: 200,
      json: {
        status: 'added',
        filter: {
          id: 0,
          keyword: 'spam',
          scope: 'subject',
          caseSensitive: false,
          isRegex: false,
          enabled: true,
        },
      },
    });
    expect(await call('PATCH', '/api/filters/g/0', JSON.stringify({ enabled: false }))).toEqual({
      status: 200,
      json: { status: 'updated' },
    });
    expect(await call('PATCH', '/api/filters/g/5', JSON.stringify({ enabled: false }))).toEqual({
      status: 404,
      json: { error: 'Filter not found' },
    });

    const listed = await call('GET', '/api/filters/g');
    expect(listed.json).toEqual([
      { id: 0, keyword: 'spam', scope: 'subject', caseSensitive: false, isRegex: false, enabled: false },
    ]);

    expect(await call('DELETE', '/api/filters/g', JSON.stringify({ id: 0 }))).toEqual({
      status: 200,
      json: { status: 'removed' },
    });
    expect((await call('GET', '/api/filters')).json).toEqual({ g: [] });
  });

  it('requires a body to remove a filter', async () => {
    expect(await call('DELETE', '/api/filters/g')).toEqual({
      status: 400,
      json: { error: 'Invalid request body: (body)' },
    });
  });

  it('imports and clears filters', async () => {
    const imported = {
      v: [{ id: 3, keyword: 'x', scope: 'both', caseSensitive: true, isRegex: false, enabled: true }],
    };
    expect(await call('PUT', '/api/filters', JSON.stringify(imported))).toEqual({
      status: 200,
      json: { status: 'imported' },
    });
    expect((await call('GET', '/api/filters')).json).toEqual(imported);

    expect(await call('POST', '/api/filters/v/clear')).toEqual({
      status: 200,
      json: { status: 'cleared' },
    });
    expect((await call('GET', '/api/filters/v')).json).toEqual([]);
  });
});

describe('administration routes', () => {
  it('reports health', async () => {
    expect(await call('GET', '/api/health')).toEqual({
      status: 200,
      json: { status: 'ok', version: '2.0.0', cacheEnabled: true, apiReachable: true },
    });
  });

  it('reports stats and clears the cache', async () => {
    await call('GET', '/api/thread/g/123');

    const stats = await call('GET', '/api/cache/stats');
    expect(stats.json).toMatchObject({
      database: { boardCount: 0, threadCount: 1, totalReplies: 0 },
      cacheSizeMb: 500,
      cacheTtlMinutes: 10,
    });

    expect(await call('POST', '/api/cache/clear')).toEqual({
      status: 200,
      json: { status: 'cleared' },
    });
    const after = await call('GET', '/api/cache/stats');
    expect(after.json).toMatchObject({ database: { threadCount: 0 } });
  });

  it('exposes buffered log entries', async () => {
    const { status, json } = await call('GET', '/api/logs');
    expect(status).toBe(200);
    expect(Array.isArray(json)).toBe(true);
  });
});

describe('shutdown', () => {
  it('does not wait for queued thumbnail prefetches', async () => {
    const slowDir = mkdtempSync(join(tmpdir(), 'server-shutdown-'));
    const posts = [1, 2, 3, 4, 5, 6].map((no) => ({ no, tim: 1700000000000 + no, ext: '.png' }));
    const throttled = await createApp(
      loadConfig({
        DATA_DIR: slowDir,
        PORT: '0',
        MAX_RETRIES: '1',
        RETRY_DELAY: '0',
        RATE_LIMIT_INTERVAL: '1000',
        API_BASE_URL: 'http://api.test',
        MEDIA_BASE_URL: 'http://media.test',
      }),
      {
        transport: {
          get: async () => jsonResponse(200, { posts }),
          download: async () => ({ status: 404, bytes: 0 }),
        },
      },
    );
    try {
      expect((await throttled.orchestrator.getThread('g', 1)).ok).toBe(true);
      expect(throttled.blobs.pendingCount).toBe(6);

      const started = Date.now();
      await throttled.shutdown();
      expect(Date.now() - started).toBeLessThan(500);
    } finally {
      rmSync(slowDir, { recursive: true, force: true });
    }
  });
});
