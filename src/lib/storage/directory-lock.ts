/**
 * Directory-scoped mutual exclusion
 *
 * Two layers: a keyed in-process mutex (same event loop), and an exclusive
 * lock file inside the directory (other processes, e.g. a scheduled renewal
 * racing a manual one). A lock file older than `staleMs` is considered
 * abandoned and removed.
 */

import { open, rm, stat } from 'fs/promises';
import { join, resolve } from 'path';
import {
  LOCK_FILE_NAME,
  LOCK_RETRY_INTERVAL_MS,
  LOCK_STALE_MS,
  LOCK_TIMEOUT_MS,
  PRIVATE_FILE_MODE,
} from '../constants/defaults.js';
import { StorageError } from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import { isNotFound } from './fs-utils.js';

const log = createLogger('lock');

export interface DirectoryLockOptions {
  staleMs?: number;
  retryIntervalMs?: number;
  timeoutMs?: number;
}

/** Serializes async work per key within this process. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    // the next waiter only needs to know that this run settled
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

const mutex = new KeyedMutex();

function alreadyExists(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
}

async function isStale(path: string, staleMs: number): Promise<boolean> {
  try {
    const info = await stat(path);
    return Date.now() - info.mtimeMs > staleMs;
  } catch (e) {
    if (isNotFound(e)) return true;
    throw e;
  }
}

async function acquireLockFile(path: string, options: Required<DirectoryLockOptions>): Promise<void> {
  const started = Date.now();
  for (;;) {
    try {
      const handle = await open(path, 'wx', PRIVATE_FILE_MODE);
      try {
        await handle.writeFile(JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));
      } finally {
        await handle.close();
      }
      return;
    } catch (e) {
      if (!alreadyExists(e)) throw StorageError.wrap('lock', path, e);
    }

    if (await isStale(path, options.staleMs)) {
      log.warn('Removing stale lock %s', path);
      await rm(path, { force: true });
      continue;
    }
    if (Date.now() - started >= options.timeoutMs) {
      throw StorageError.lockTimeout(path, options.timeoutMs);
    }
    await new Promise((r) => setTimeout(r, options.retryIntervalMs));
  }
}

/**
 * Run `fn` while holding the lock for `dir`. The directory must exist.
 */
export async function withDirectoryLock<T>(
  dir: string,
  fn: () => Promise<T>,
  options: DirectoryLockOptions = {},
): Promise<T> {
  const resolved: Required<DirectoryLockOptions> = {
    staleMs: options.staleMs ?? LOCK_STALE_MS,
    retryIntervalMs: options.retryIntervalMs ?? LOCK_RETRY_INTERVAL_MS,
    timeoutMs: options.timeoutMs ?? LOCK_TIMEOUT_MS,
  };
  const key = resolve(dir);
  const lockPath = join(key, LOCK_FILE_NAME);

  return mutex.run(key, async () => {
    await acquireLockFile(lockPath, resolved);
    log.debug('Acquired %s', lockPath);
    try {
      return await fn();
    } finally {
      await rm(lockPath, { force: true });
      log.debug('Released %s', lockPath);
    }
  });
}
