/**
 * On-disk layout of an ingest root
 */

import { mkdir, open } from 'fs/promises';
import { join, resolve } from 'path';

export interface IngestLayout {
  rootDir: string;
  inputDir: string;
  objectsDir: string;
  hashedDir: string;
  objectsTable: string;
  hashCountTable: string;
  ledgerTable: string;
  lockDir: string;
  inflightDir: string;
}

export function resolveLayout(rootDir: string): IngestLayout {
  const root = resolve(rootDir);
  const lockDir = join(root, '.locks');
  return {
    rootDir: root,
    inputDir: join(root, 'pdf'),
    objectsDir: join(root, 'pdf-objects'),
    hashedDir: join(root, 'hashed-objects'),
    objectsTable: join(root, 'objects.tsv'),
    hashCountTable: join(root, 'hash-count.tsv'),
    ledgerTable: join(root, 'processed.tsv'),
    lockDir,
    inflightDir: join(lockDir, 'inflight'),
  };
}

/**
 * Create missing directories and empty ledger/projection files.
 * The objects table header is handled by ObjectsTable.ensureSchema.
 */
export async function ensureLayout(layout: IngestLayout): Promise<void> {
  for (const dir of [layout.inputDir, layout.objectsDir, layout.hashedDir, layout.lockDir, layout.inflightDir]) {
    await mkdir(dir, { recursive: true });
  }
  for (const file of [layout.ledgerTable, layout.hashCountTable]) {
    // 'a' creates the file without touching existing content
    const handle = await open(file, 'a');
    await handle.close();
  }
}
