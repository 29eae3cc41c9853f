/**
 * In-flight guards: one marker file per document hash while a worker owns it.
 *
 * Markers are created exclusively, so two workers racing for the same hash
 * cannot both win. A marker left by a killed process is reclaimed when its pid
 * is gone (same host) or when it is older than the configured age.
 */

import pino from 'pino';
import { hostname } from 'os';
import { open, readFile, stat } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { hasErrorCode, removeIfExists } from './fs-utils.js';
import type { LockDirectory } from './locks.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'storage.inflight' });

const GuardRecordSchema = z.object({
  acquiredAt: z.string(),
  pid: z.number().int(),
  hostname: z.string(),
});

export type GuardRecord = z.infer<typeof GuardRecordSchema>;

export interface InFlightGuard {
  readonly sha256: string;
  readonly path: string;
  release(): Promise<void>;
}

export type GuardedResult<T> = { acquired: true; value: T } | { acquired: false };

export interface InFlightGuardsOptions {
  /** Age after which a marker is reclaimed regardless of its pid; 0 disables. */
  staleAfterMs?: number;
  /** Liveness probe for a pid on this host. */
  isProcessAlive?: (pid: number) => boolean;
  now?: () => number;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return hasErrorCode(error, 'EPERM');
  }
}

export class InFlightGuards {
  private readonly staleAfterMs: number;
  private readonly alive: (pid: number) => boolean;
  private readonly now: () => number;
  private readonly host = hostname();

  constructor(
    readonly dir: string,
    private readonly locks: LockDirectory,
    options: InFlightGuardsOptions = {}
  ) {
    this.staleAfterMs = options.staleAfterMs ?? 0;
    this.alive = options.isProcessAlive ?? isProcessAlive;
    this.now = options.now ?? Date.now;
  }

  pathFor(sha256: string): string {
    return join(this.dir, `${sha256}.lock`);
  }

  /**
   * Whether a live worker currently owns the hash. Stale markers are reclaimed.
   */
  async isHeld(sha256: string): Promise<boolean> {
    const path = this.pathFor(sha256);
    const snapshot = await this.readMarker(path);
    if (snapshot === null) return false;
    if (!this.isStale(snapshot)) return true;
    await this.reclaim(path);
    return (await this.readMarker(path)) !== null;
  }

  /**
   * Create the marker, or return null when another worker holds it
   */
  async tryAcquire(sha256: string): Promise<InFlightGuard | null> {
    const path = this.pathFor(sha256);
    if (await this.create(path)) {
      return this.guardFor(sha256, path);
    }
    if (!(await this.isHeld(sha256)) && (await this.create(path))) {
      return this.guardFor(sha256, path);
    }
    return null;
  }

  /**
   * Run `fn` while owning the hash; the marker is removed on every exit path
   */
  async withGuard<T>(sha256: string, fn: () => Promise<T>): Promise<GuardedResult<T>> {
    const guard = await this.tryAcquire(sha256);
    if (!guard) return { acquired: false };
    try {
      return { acquired: true, value: await fn() };
    } finally {
      await guard.release();
    }
  }

  private guardFor(sha256: string, path: string): InFlightGuard {
    let released = false;
    return {
      sha256,
      path,
      release: async () => {
        if (released) return;
        released = true;
        await removeIfExists(path);
      },
    };
  }

  private async create(path: string): Promise<boolean> {
    const record: GuardRecord = {
      acquiredAt: new Date(this.now()).toISOString(),
      pid: process.pid,
      hostname: this.host,
    };
    try {
      const handle = await open(path, 'wx');
      try {
        await handle.writeFile(`${JSON.stringify(record)}\n`, 'utf8');
      } finally {
        await handle.close();
      }
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) return false;
      throw error;
    }
  }

  private async readMarker(path: string): Promise<MarkerSnapshot | null> {
    try {
      const [content, info] = await Promise.all([readFile(path, 'utf8'), stat(path)]);
      return { content, mtimeMs: info.mtimeMs };
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw error;
    }
  }

  private isStale(snapshot: MarkerSnapshot): boolean {
    const record = parseGuardRecord(snapshot.content);
    // A marker mid-write has no record yet; only age can judge it
    const acquiredMs = record ? Date.parse(record.acquiredAt) : snapshot.mtimeMs;

    if (record && record.hostname === this.host && !this.alive(record.pid)) {
      return true;
    }
    if (this.staleAfterMs > 0 && this.now() - (Number.isNaN(acquiredMs) ? snapshot.mtimeMs : acquiredMs) > this.staleAfterMs) {
      return true;
    }
    return false;
  }

  /**
   * Remove a stale marker. The decision is repeated under a lock so a marker
   * freshly created by another worker is never removed.
   */
  private async reclaim(path: string): Promise<void> {
    await this.locks.withLock('inflight', async () => {
      const snapshot = await this.readMarker(path);
      if (snapshot === null || !this.isStale(snapshot)) return;
      await removeIfExists(path);
      logger.warn(
        { event: 'storage.inflight.reclaimed', path, record: parseGuardRecord(snapshot.content) },
        'Reclaimed in-flight guard left by a stopped worker'
      );
    });
  }
}

interface MarkerSnapshot {
  content: string;
  mtimeMs: number;
}

export function parseGuardRecord(content: string): GuardRecord | null {
  try {
    const result = GuardRecordSchema.safeParse(JSON.parse(content));
    return result.success ? result.data : null;
  } catch {
    // Not JSON: written by an older version or torn
    return null;
  }
}
