/**
 * Ledger: the authoritative record of completed documents
 */

import pino from 'pino';
import { LedgerCorruptionError, isSha256Hex, type LedgerEntry } from '@objledger/core';
import { appendLines, completeLines, readTextOrEmpty, tsvField } from './fs-utils.js';
import type { LockDirectory } from './locks.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'storage.ledger' });

export function formatLedgerEntry(entry: LedgerEntry): string {
  return [entry.sha256, tsvField(entry.name), String(entry.bytes), String(entry.mtime), entry.completedAt].join('\t');
}

/**
 * Current time as ISO-8601 UTC without milliseconds
 */
export function ledgerTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Hashes recorded in ledger content. Throws LedgerCorruptionError on a complete
 * line whose first field is not a SHA-256 digest.
 */
export function parseLedgerHashes(content: string): Set<string> {
  const hashes = new Set<string>();
  const lines = completeLines(content);
  lines.forEach((line, index) => {
    if (line.trim().length === 0) return;
    const sha = line.split('\t')[0];
    if (!isSha256Hex(sha)) {
      throw new LedgerCorruptionError(`Ledger line ${index + 1} does not start with a SHA-256 digest`, {
        context: { line: index + 1 },
      });
    }
    hashes.add(sha);
  });
  return hashes;
}

export class LedgerTable {
  constructor(readonly path: string, private readonly locks: LockDirectory) {}

  async hashes(): Promise<Set<string>> {
    return parseLedgerHashes(await readTextOrEmpty(this.path));
  }

  async has(sha256: string): Promise<boolean> {
    return (await this.hashes()).has(sha256);
  }

  /**
   * Append unless the hash is already recorded; the check and the write happen
   * under the ledger lock. Returns whether a line was written.
   */
  async appendIfMissing(entry: LedgerEntry): Promise<boolean> {
    return this.locks.withLock('processed', async () => {
      if (await this.has(entry.sha256)) {
        logger.debug({ event: 'storage.ledger.duplicate', sha256: entry.sha256 }, 'Ledger already has entry');
        return false;
      }
      await appendLines(this.path, [formatLedgerEntry(entry)]);
      return true;
    });
  }
}
