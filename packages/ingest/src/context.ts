/**
 * Wiring from settings to a ready coordinator
 */

import pino from 'pino';
import type { IngestSettings } from '@objledger/config';
import type { ContentHasher, MetadataProviders, ObjectExtractor } from '@objledger/core';
import {
  DedupStore,
  HashCountProjection,
  InFlightGuards,
  LedgerTable,
  LockDirectory,
  ObjectsTable,
  ensureLayout,
  resolveLayout,
  type IngestLayout,
} from '@objledger/storage';
import { MutoolExtractor, Sha256Hasher, createMetadataProviders } from '@objledger/tools';
import { DocumentCoordinator, type StateChange } from './coordinator.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'ingest.context' });

/** Dedup temp files older than this are assumed abandoned. */
export const TEMP_FILE_MAX_AGE_MS = 60 * 60 * 1000;

export type ContextSettings = Pick<
  IngestSettings,
  'rootDir' | 'quiescenceIntervalMs' | 'quiescenceAttempts' | 'guardStaleSeconds' | 'tools'
>;

/** Replacements for the external tools, used by tests. */
export interface CapabilityOverrides {
  hasher?: ContentHasher;
  extractor?: ObjectExtractor;
  metadata?: MetadataProviders;
  isProcessAlive?: (pid: number) => boolean;
  onStateChange?: (change: StateChange) => void;
}

export interface IngestContext {
  layout: IngestLayout;
  objects: ObjectsTable;
  ledger: LedgerTable;
  counts: HashCountProjection;
  dedup: DedupStore;
  guards: InFlightGuards;
  coordinator: DocumentCoordinator;
}

export function createIngestContext(settings: ContextSettings, overrides: CapabilityOverrides = {}): IngestContext {
  const layout = resolveLayout(settings.rootDir);
  const locks = new LockDirectory(layout.lockDir);
  const objects = new ObjectsTable(layout.objectsTable, locks);
  const ledger = new LedgerTable(layout.ledgerTable, locks);
  const counts = new HashCountProjection(layout.hashCountTable, layout.objectsTable, locks);
  const dedup = new DedupStore(layout.hashedDir, locks);
  const guards = new InFlightGuards(layout.inflightDir, locks, {
    staleAfterMs: settings.guardStaleSeconds * 1000,
    isProcessAlive: overrides.isProcessAlive,
  });

  const coordinator = new DocumentCoordinator({
    layout,
    hasher: overrides.hasher ?? new Sha256Hasher(),
    extractor: overrides.extractor ?? new MutoolExtractor(settings.tools.mutool),
    metadata: overrides.metadata ?? createMetadataProviders(settings.tools),
    objects,
    ledger,
    counts,
    dedup,
    guards,
    quiescence: { intervalMs: settings.quiescenceIntervalMs, attempts: settings.quiescenceAttempts },
    onStateChange: overrides.onStateChange,
  });

  return { layout, objects, ledger, counts, dedup, guards, coordinator };
}

/**
 * Directories, table header or migration, and cleanup of abandoned temp files.
 * Runs before any document is processed.
 */
export async function prepareRoot(context: IngestContext): Promise<void> {
  await ensureLayout(context.layout);
  const schema = await context.objects.ensureSchema();
  const swept = await context.dedup.sweepStaleTemps(TEMP_FILE_MAX_AGE_MS);
  logger.debug({ event: 'ingest.root.prepared', rootDir: context.layout.rootDir, schema, swept }, 'Ingest root ready');
}
