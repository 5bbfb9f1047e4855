import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  atomicWriteFile,
  readFileSafeAsync,
  withFileLock,
} from '../../src/main/services/file-io';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'file-io-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('atomicWriteFile', () => {
  it('creates parent directories and writes the content', async () => {
    const path = join(dir, 'nested', 'a.json');
    await atomicWriteFile(path, '{"a":1}');
    expect(readFileSync(path, 'utf-8')).toBe('{"a":1}');
    expect(readdirSync(join(dir, 'nested'))).toEqual(['a.json']);
  });

  it('keeps the previous content as a backup', async () => {
    const path = join(dir, 'a.json');
    await atomicWriteFile(path, 'first');
    await atomicWriteFile(path, 'second');
    expect(readFileSync(path, 'utf-8')).toBe('second');
    expect(readFileSync(`${path}.bak`, 'utf-8')).toBe('first');
  });
});

describe('readFileSafeAsync', () => {
  it('returns null for a missing file', async () => {
    expect(await readFileSafeAsync(join(dir, 'missing.json'))).toBeNull();
  });

  it('returns the bytes of an existing file', async () => {
    const path = join(dir, 'b.txt');
    await atomicWriteFile(path, 'hello');
    expect((await readFileSafeAsync(path))?.toString('utf-8')).toBe('hello');
  });
});

describe('withFileLock', () => {
  it('runs holders of the same path one at a time in arrival order', async () => {
    const path = join(dir, 'c.json');
    const events: string[] = [];
    const hold = (name: string, ms: number) =>
      withFileLock(path, async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, ms));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([hold('a', 20), hold('b', 0)]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets the next holder run after a failure', async () => {
    const path = join(dir, 'd.json');
    const failing = withFileLock(path, () => Promise.reject(new Error('boom')));
    const next = withFileLock(path, async () => 'ran');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('ran');
    expect(existsSync(path)).toBe(false);
  });
});
