/**
 * Atomic file I/O with per-path locking and backup support.
 */
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '../logger';

const logger = createLogger('file-io');

/** Tail of the pending-operation chain per file path (process-level) */
const lockChains = new Map<string, Promise<unknown>>();

let tmpSequence = 0;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Run fn while holding the lock on filePath. Callers queue in arrival order;
 * a failing holder does not block the next one.
 */
export async function withFileLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const previous = lockChains.get(filePath) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const tail = run.then(
    () => undefined,
    () => undefined,
  );
  lockChains.set(filePath, tail);
  try {
    return await run;
  } finally {
    if (lockChains.get(filePath) === tail) {
      lockChains.delete(filePath);
    }
  }
}

/**
 * Write content to a file atomically via a temporary file.
 * Creates parent directories if needed.
 * Keeps the previous content as a .bak backup for recovery.
 * Does not take the lock; use withFileLock around read-modify-write sequences.
 */
export async function atomicWriteFile(filePath: string, content: Buffer | string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  tmpSequence += 1;
  const tmpPath = `${filePath}.tmp.${String(Date.now())}-${String(tmpSequence)}`;
  await writeFile(tmpPath, content);

  const bakPath = `${filePath}.bak`;
  try {
    await unlink(bakPath);
  } catch (err) {
    if (!isNotFound(err)) {
      logger.warn(`Failed to remove old backup ${bakPath}: ${String(err)}`);
    }
  }
  try {
    await rename(filePath, bakPath);
  } catch (err) {
    if (!isNotFound(err)) {
      logger.warn(
        `Failed to create backup for ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  await rename(tmpPath, filePath);
}

/**
 * Read a file's contents. Returns null if the file doesn't exist.
 */
export async function readFileSafeAsync(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}
