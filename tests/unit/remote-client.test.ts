import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchStatus, type HttpResponse } from '../../src/types/api';
import type { HttpTransport } from '../../src/main/services/http-client';
import { RateLimiter } from '../../src/main/services/rate-limiter';
import { RemoteClient } from '../../src/main/services/remote-client';

function jsonResponse(status: number, data: unknown): HttpResponse {
  return { status, headers: {}, body: Buffer.from(JSON.stringify(data)) };
}

function createClient() {
  const get = vi.fn<HttpTransport['get']>();
  const download = vi.fn<HttpTransport['download']>();
  const client = new RemoteClient({
    endpoints: { apiBaseUrl: 'http://api.test', mediaBaseUrl: 'http://media.test' },
    retry: { maxAttempts: 3, delayMs: 0 },
    timeouts: { jsonMs: 10_000, downloadMs: 15_000, healthMs: 5_000 },
    limiter: new RateLimiter(0),
    transport: { get, download },
  });
  return { client, get, download };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('RemoteClient URLs', () => {
  it('builds API and media URLs', () => {
    const { client } = createClient();
    expect(client.boardsUrl()).toBe('http://api.test/boards.json');
    expect(client.catalogUrl('g')).toBe('http://api.test/g/catalog.json');
    expect(client.threadUrl('g', 123)).toBe('http://api.test/g/thread/123.json');
    expect(client.imageUrl('g', '1700000000000', '.png')).toBe(
      'http://media.test/g/1700000000000.png',
    );
    expect(client.thumbnailUrl('g', '1700000000000')).toBe(
      'http://media.test/g/1700000000000s.jpg',
    );
  });
});

describe('RemoteClient.fetchJson', () => {
  it('returns NotFound on 404 without retrying', async () => {
    const { client, get } = createClient();
    get.mockResolvedValue(jsonResponse(404, {}));

    const result = await client.fetchThread('g', 999);

    expect(result).toEqual({ status: FetchStatus.NotFound });
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('retries a server error and succeeds', async () => {
    const { client, get } = createClient();
    get
      .mockResolvedValueOnce(jsonResponse(500, {}))
      .mockResolvedValueOnce(jsonResponse(200, { posts: [{ no: 1 }] }));

    const result = await client.fetchThread('g', 1);

    expect(result).toEqual({ status: FetchStatus.Ok, data: { posts: [{ no: 1 }] } });
    expect(get).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured attempts', async () => {
    const { client, get } = createClient();
    get.mockResolvedValue(jsonResponse(503, {}));

    const result = await client.fetchBoards();

    expect(result).toEqual({ status: FetchStatus.Failed, errorMessage: 'HTTP 503' });
    expect(get).toHaveBeenCalledTimes(3);
  });

  it('retries transport errors', async () => {
    const { client, get } = createClient();
    get
      .mockRejectedValueOnce(new Error('Request timeout after 10000ms'))
      .mockResolvedValueOnce(jsonResponse(200, { boards: [] }));

    const result = await client.fetchBoards();

    expect(result).toEqual({ status: FetchStatus.Ok, data: [] });
    expect(get).toHaveBeenCalledTimes(2);
  });

  it('reports the last transport error after exhausting attempts', async () => {
    const { client, get } = createClient();
    get.mockRejectedValue(new Error('socket hang up'));

    const result = await client.fetchCatalog('g');

    expect(result).toEqual({ status: FetchStatus.Failed, errorMessage: 'socket hang up' });
  });

  it('does not retry a payload that fails validation', async () => {
    const { client, get } = createClient();
    get.mockResolvedValue(jsonResponse(200, { unexpected: true }));

    const result = await client.fetchBoards();

    expect(result).toEqual({
      status: FetchStatus.Failed,
      errorMessage: 'Unexpected payload from http://api.test/boards.json',
    });
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('passes the JSON timeout to the transport', async () => {
    const { client, get } = createClient();
    get.mockResolvedValue(jsonResponse(200, { boards: [] }));

    await client.fetchBoards();

    expect(get).toHaveBeenCalledWith('http://api.test/boards.json', {
      timeoutMs: 10_000,
      agent: undefined,
    });
  });
});

describe('RemoteClient typed fetches', () => {
  it('flattens catalog pages into one list', async () => {
    const { client, get } = createClient();
    get.mockResolvedValue(
      jsonResponse(200, [
        { page: 1, threads: [{ no: 1 }, { no: 2 }] },
        { page: 2, threads: [{ no: 3 }] },
      ]),
    );

    const result = await client.fetchCatalog('g');

    expect(result.status).toBe(FetchStatus.Ok);
    if (result.status !== FetchStatus.Ok) return;
    expect(result.data.map((thread) => thread.no)).toEqual([1, 2, 3]);
    expect(get).toHaveBeenCalledWith('http://api.test/g/catalog.json', expect.anything());
  });

  it('keeps unknown fields of board entries', async () => {
    const { client, get } = createClient();
    get.mockResolvedValue(
      jsonResponse(200, { boards: [{ board: 'g', title: 'Technology', ws_board: 1, pages: 10 }] }),
    );

    const result = await client.fetchBoards();

    expect(result).toEqual({
      status: FetchStatus.Ok,
      data: [{ board: 'g', title: 'Technology', ws_board: 1, pages: 10 }],
    });
  });
});

describe('RemoteClient.downloadBinary', () => {
  it('returns true on 200', async () => {
    const { client, download } = createClient();
    download.mockResolvedValue({ status: 200, bytes: 42 });

    const ok = await client.downloadBinary('http://media.test/g/1.png', '/tmp/x/1.png');

    expect(ok).toBe(true);
    expect(download).toHaveBeenCalledWith('http://media.test/g/1.png', '/tmp/x/1.png', {
      timeoutMs: 15_000,
      agent: undefined,
    });
  });

  it('stops on 404', async () => {
    const { client, download } = createClient();
    download.mockResolvedValue({ status: 404, bytes: 0 });

    const ok = await client.downloadBinary('http://media.test/g/1.png', '/tmp/x/1.png');

    expect(ok).toBe(false);
    expect(download).toHaveBeenCalledTimes(1);
  });

  it('retries other failures and returns false when they persist', async () => {
    const { client, download } = createClient();
    download.mockResolvedValueOnce({ status: 502, bytes: 0 }).mockRejectedValue(new Error('reset'));

    const ok = await client.downloadBinary('http://media.test/g/1.png', '/tmp/x/1.png');

    expect(ok).toBe(false);
    expect(download).toHaveBeenCalledTimes(3);
  });
});

describe('RemoteClient.checkHealth', () => {
  it('is true when the board list answers 200', async () => {
    const { client, get } = createClient();
    get.mockResolvedValue(jsonResponse(200, { boards: [] }));

    expect(await client.checkHealth()).toBe(true);
    expect(get).toHaveBeenCalledWith('http://api.test/boards.json', {
      timeoutMs: 5_000,
      agent: undefined,
    });
  });

  it('is false on an error status or a transport error', async () => {
    const { client, get } = createClient();
    get.mockResolvedValueOnce(jsonResponse(500, {})).mockRejectedValueOnce(new Error('offline'));

    expect(await client.checkHealth()).toBe(false);
    expect(await client.checkHealth()).toBe(false);
    expect(get).toHaveBeenCalledTimes(2);
  });
});
