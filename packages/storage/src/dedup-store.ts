/**
 * Content-addressed blob store: one file per distinct object hash.
 *
 * The first extension seen for a hash is the one kept; later copies of the same
 * content under another extension are discarded.
 */

import pino from 'pino';
import { randomBytes } from 'crypto';
import { copyFile, readdir, rename, stat } from 'fs/promises';
import { join } from 'path';
import { objectExtension } from '@objledger/core';
import { hasErrorCode, removeIfExists } from './fs-utils.js';
import type { LockDirectory } from './locks.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'storage.dedup' });

const TEMP_PREFIX = '.tmp-';

export type DedupResult = 'stored' | 'exists';

export class DedupStore {
  // Blobs are never removed, so a hit stays valid for the life of the process
  private readonly known = new Set<string>();

  constructor(readonly dir: string, private readonly locks: LockDirectory) {}

  /**
   * Path of the blob stored for a hash, whatever its extension. `extension` is
   * tried first so the usual hit needs no directory listing.
   */
  async find(sha256: string, extension = ''): Promise<string | null> {
    const direct = await this.findDirect(sha256, extension);
    if (direct) return direct;

    const entries = await readdir(this.dir);
    const match = entries.find((name) => name === sha256 || name.startsWith(`${sha256}.`));
    if (match) {
      this.known.add(sha256);
      return join(this.dir, match);
    }
    return null;
  }

  async put(sha256: string, sourcePath: string): Promise<DedupResult> {
    const extension = objectExtension(sourcePath);
    if (this.known.has(sha256) || (await this.findDirect(sha256, extension))) {
      return 'exists';
    }

    const destination = join(this.dir, `${sha256}${extension}`);
    const tmp = join(this.dir, `${TEMP_PREFIX}${sha256}-${randomBytes(4).toString('hex')}`);

    try {
      await copyFile(sourcePath, tmp);
      const result = await this.locks.withLock('hashed', async (): Promise<DedupResult> => {
        if (await this.find(sha256, extension)) return 'exists';
        await rename(tmp, destination);
        return 'stored';
      });
      this.known.add(sha256);
      if (result === 'stored') {
        logger.debug({ event: 'storage.dedup.stored', sha256, path: destination }, 'Stored new blob');
      }
      return result;
    } finally {
      await removeIfExists(tmp);
    }
  }

  private async findDirect(sha256: string, extension: string): Promise<string | null> {
    const names = extension ? [`${sha256}${extension}`, sha256] : [sha256];
    for (const name of names) {
      const path = join(this.dir, name);
      try {
        await stat(path);
        this.known.add(sha256);
        return path;
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error;
      }
    }
    return null;
  }

  /**
   * Remove temp files abandoned by killed writers
   */
  async sweepStaleTemps(maxAgeMs: number, now: number = Date.now()): Promise<number> {
    let removed = 0;
    for (const name of await readdir(this.dir)) {
      if (!name.startsWith(TEMP_PREFIX)) continue;
      const path = join(this.dir, name);
      let mtimeMs: number;
      try {
        mtimeMs = (await stat(path)).mtimeMs;
      } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) continue;
        throw error;
      }
      if (now - mtimeMs >= maxAgeMs && (await removeIfExists(path))) {
        removed++;
      }
    }
    if (removed > 0) {
      logger.info({ event: 'storage.dedup.swept', removed }, 'Removed abandoned temp files');
    }
    return removed;
  }
}
