import fs from 'node:fs/promises';
import lockfile from 'proper-lockfile';
import { LockError } from '../lib/errors.js';
import { lockFilePath, sessionName } from '../lib/paths.js';

/**
 * Serializes mutations of one worker between rig processes. Keys are
 * `<repo>@<worker>`; attaching happens after the lock is released.
 */
export interface WorkerLock {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export class FileWorkerLock implements WorkerLock {
  constructor(private readonly lockDir: string) {}

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await fs.mkdir(this.lockDir, { recursive: true });

    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(lockFilePath(this.lockDir, key), {
        realpath: false,
        stale: 30_000,
        retries: {
          retries: 5,
          minTimeout: 100,
          maxTimeout: 1000,
        },
      });
    } catch {
      throw new LockError(key);
    }

    try {
      return await fn();
    } finally {
      await release();
    }
  }
}

export function workerLockKey(repo: string, worker: string): string {
  return sessionName(repo, worker);
}
