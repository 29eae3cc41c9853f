/**
 * Hash-count projection: occurrences of each object hash across the main table.
 * Always rebuilt in full; never a source of truth.
 */

import type { HashCount } from '@objledger/core';
import { atomicWriteFile, completeLines, readTextOrEmpty } from './fs-utils.js';
import type { LockDirectory } from './locks.js';
import { HASH_COLUMN } from './objects-table.js';

/**
 * Count hashes in main-table content (header skipped). Sorted by count
 * descending, then by hash in code-unit order.
 */
export function computeHashCounts(objectsContent: string): HashCount[] {
  const counts = new Map<string, number>();
  for (const line of completeLines(objectsContent).slice(1)) {
    const fields = line.split('\t');
    if (fields.length <= HASH_COLUMN) continue;
    const sha = fields[HASH_COLUMN];
    if (!sha) continue;
    counts.set(sha, (counts.get(sha) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([sha256, count]) => ({ sha256, count }))
    .sort((a, b) => b.count - a.count || (a.sha256 < b.sha256 ? -1 : a.sha256 > b.sha256 ? 1 : 0));
}

export function formatHashCounts(counts: readonly HashCount[]): string {
  return counts.map(({ sha256, count }) => `${sha256}\t${count}\n`).join('');
}

export class HashCountProjection {
  constructor(
    readonly path: string,
    private readonly objectsPath: string,
    private readonly locks: LockDirectory
  ) {}

  /**
   * Recompute from the main table and replace the projection file.
   * Read and write both happen under the counts lock so an older read can
   * never overwrite a newer projection.
   */
  async rebuild(): Promise<HashCount[]> {
    return this.locks.withLock('counts', async () => {
      const counts = computeHashCounts(await readTextOrEmpty(this.objectsPath));
      await atomicWriteFile(this.path, formatHashCounts(counts));
      return counts;
    });
  }
}
