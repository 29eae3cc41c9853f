/**
 * Named cross-process locks, one per shared resource
 *
 * Each table (and the dedup store) has its own lock so unrelated writers never
 * wait on each other. Locks are mkdir-based via proper-lockfile and work across
 * processes sharing the same root.
 */

import lockfile from 'proper-lockfile';
import pino from 'pino';
import { join } from 'path';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'storage.locks' });

export type LockName = 'objects' | 'processed' | 'counts' | 'hashed' | 'inflight';

export interface LockDirectoryOptions {
  /** A held lock older than this (not refreshed) is considered abandoned. */
  staleMs?: number;
  /** How many times to retry a busy lock before giving up. */
  retries?: number;
}

export class LockDirectory {
  private readonly staleMs: number;
  private readonly retries: number;

  constructor(readonly dir: string, options: LockDirectoryOptions = {}) {
    this.staleMs = options.staleMs ?? 10000;
    this.retries = options.retries ?? 2000;
  }

  pathFor(name: LockName): string {
    return join(this.dir, `${name}.lock`);
  }

  /**
   * Run `fn` while holding the named lock; the lock is released on every exit path
   */
  async withLock<T>(name: LockName, fn: () => Promise<T>): Promise<T> {
    const lockPath = this.pathFor(name);
    const release = await lockfile.lock(lockPath, {
      lockfilePath: lockPath,
      realpath: false,
      stale: this.staleMs,
      retries: { retries: this.retries, factor: 1.2, minTimeout: 10, maxTimeout: 250 },
      onCompromised: (err) => {
        logger.error({ event: 'storage.lock.compromised', lock: name, error: err.message }, 'Lock was compromised');
      },
    });

    try {
      return await fn();
    } finally {
      await release();
    }
  }
}
