/**
 * Document coordinator: takes one PDF from the input directory to a ledger entry,
 * at most once per distinct content, across restarts and concurrent workers.
 *
 * Order of durable effects for a document: object rows (and blobs), then the
 * stamp in its extraction directory, then the ledger entry. A crash between any
 * two of them is repaired by the next attempt:
 *   - rows without a stamp: the document is extracted again and rows already
 *     recorded for the same content are not appended twice. The progress marker
 *     in the extraction directory tells a resumed attempt from new content
 *     arriving under a name seen before, which starts from an empty directory.
 *   - stamp without a ledger entry: the entry is appended without re-extracting
 */

import pino from 'pino';
import { stat } from 'fs/promises';
import { basename, join, relative, sep } from 'path';
import {
  ExtractionFailureError,
  TransientIOError,
  isFatal,
  isExtractionMarker,
  isFontExtension,
  isIngestError,
  objectExtension,
  safeDocumentName,
  safeErrorMessage,
  type ContentHasher,
  type DocumentInfo,
  type DocumentMetadata,
  type ExtractedObject,
  type LedgerEntry,
  type MetadataProviders,
  type ObjectExtractor,
} from '@objledger/core';
import {
  finishExtraction,
  hasErrorCode,
  ledgerTimestamp,
  objectRowKey,
  readExtractionProgress,
  readStamp,
  startExtraction,
  writeStamp,
  type ExtractionProgress,
  type DedupStore,
  type HashCountProjection,
  type InFlightGuards,
  type IngestLayout,
  type LedgerTable,
  type ObjectsTable,
} from '@objledger/storage';
import { collectDocumentMetadata } from './metadata.js';
import { DEFAULT_QUIESCENCE, MISSING_SIZE, waitForQuiescence, type QuiescenceOptions } from './quiescence.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'ingest.coordinator' });

export type DocumentOutcome =
  | 'done'
  | 'failed'
  | 'skipped_inflight'
  | 'skipped_processed'
  | 'skipped_stamped_reconciled'
  | 'skipped_missing';

export type DocumentState =
  | 'UNSEEN'
  | 'QUIESCING'
  | 'SKIPPED_MISSING'
  | 'SKIPPED_INFLIGHT'
  | 'SKIPPED_PROCESSED'
  | 'SKIPPED_STAMPED_RECONCILED'
  | 'EXTRACTING'
  | 'ROWS_EMITTED'
  | 'STAMPED'
  | 'LEDGERED'
  | 'FAILED';

export interface StateChange {
  path: string;
  name: string;
  sha256?: string;
  from: DocumentState;
  to: DocumentState;
}

export interface ProcessResult {
  outcome: DocumentOutcome;
  path: string;
  name: string;
  sha256?: string;
  /** Rows written by this attempt. */
  rowsAppended: number;
  /** Rows recorded for the document name after a completed attempt. */
  rowsRecorded?: number;
  error?: string;
}

export interface CoordinatorDeps {
  layout: IngestLayout;
  hasher: ContentHasher;
  extractor: ObjectExtractor;
  metadata: MetadataProviders;
  objects: ObjectsTable;
  ledger: LedgerTable;
  counts: HashCountProjection;
  dedup: DedupStore;
  guards: InFlightGuards;
  quiescence?: QuiescenceOptions;
  onStateChange?: (change: StateChange) => void;
}

const SKIP_STATES: Record<Exclude<DocumentOutcome, 'done' | 'failed'>, DocumentState> = {
  skipped_missing: 'SKIPPED_MISSING',
  skipped_inflight: 'SKIPPED_INFLIGHT',
  skipped_processed: 'SKIPPED_PROCESSED',
  skipped_stamped_reconciled: 'SKIPPED_STAMPED_RECONCILED',
};

class StateTracker {
  private current: DocumentState = 'UNSEEN';
  sha256?: string;

  constructor(
    private readonly path: string,
    private readonly name: string,
    private readonly observer?: (change: StateChange) => void
  ) {}

  to(next: DocumentState): void {
    const change: StateChange = { path: this.path, name: this.name, sha256: this.sha256, from: this.current, to: next };
    this.current = next;
    logger.debug({ event: 'ingest.document.state', ...change }, `${this.name}: ${change.from} -> ${next}`);
    this.observer?.(change);
  }
}

/**
 * Errors from the extractor, metadata tools or object hashing belong to the
 * document, not the invocation
 */
function asDocumentFailure(error: unknown, path: string): Error {
  if (isIngestError(error)) return error;
  return new ExtractionFailureError(`${basename(path)}: ${safeErrorMessage(error)}`, {
    cause: error,
    context: { path },
  });
}

export class DocumentCoordinator {
  private readonly quiescence: QuiescenceOptions;

  constructor(private readonly deps: CoordinatorDeps) {
    this.quiescence = deps.quiescence ?? DEFAULT_QUIESCENCE;
  }

  /**
   * Process one candidate file. Document-scoped failures come back as the
   * `failed` outcome; table and store failures are thrown.
   */
  async processDocument(path: string): Promise<ProcessResult> {
    const name = basename(path);
    const tracker = new StateTracker(path, name, this.deps.onStateChange);

    try {
      return await this.admit(path, name, tracker);
    } catch (error) {
      if (isFatal(error)) throw error;

      const message = safeErrorMessage(error);
      tracker.to('FAILED');
      logger.error(
        {
          event: 'ingest.document.failed',
          path,
          sha256: tracker.sha256,
          kind: isIngestError(error) ? error.kind : undefined,
          error: message,
        },
        `Failed to process ${name}; it will be retried on the next run`
      );
      return { outcome: 'failed', path, name, sha256: tracker.sha256, rowsAppended: 0, error: message };
    }
  }

  destinationFor(name: string): string {
    return join(this.deps.layout.objectsDir, safeDocumentName(name));
  }

  private async admit(path: string, name: string, tracker: StateTracker): Promise<ProcessResult> {
    tracker.to('QUIESCING');
    const settled = await waitForQuiescence(path, this.quiescence);
    if (settled.size === MISSING_SIZE) {
      return this.skip('skipped_missing', path, name, tracker);
    }

    const document = await this.identify(path, name);
    if (!document) {
      return this.skip('skipped_missing', path, name, tracker);
    }
    tracker.sha256 = document.sha256;

    if (await this.deps.guards.isHeld(document.sha256)) {
      return this.skip('skipped_inflight', path, name, tracker);
    }
    const destination = this.destinationFor(name);
    const earlier = await this.alreadyHandled(document, destination);
    if (earlier) {
      return this.skip(earlier, path, name, tracker);
    }

    const guarded = await this.deps.guards.withGuard(document.sha256, () => this.ingest(document, destination, tracker));
    if (!guarded.acquired) {
      return this.skip('skipped_inflight', path, name, tracker);
    }
    return guarded.value;
  }

  /**
   * Hash and stat the settled file; null when it disappeared meanwhile
   */
  private async identify(path: string, name: string): Promise<DocumentInfo | null> {
    try {
      const sha256 = await this.deps.hasher.hashFile(path);
      const info = await stat(path);
      return { path, name, sha256, bytes: info.size, mtime: Math.floor(info.mtimeMs / 1000) };
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw new TransientIOError(`Cannot hash ${name}: ${safeErrorMessage(error)}`, { cause: error, context: { path } });
    }
  }

  /**
   * Ledger first, then the stamp. A matching stamp without a ledger entry means
   * an earlier attempt stopped just before its last write; that write is redone.
   */
  private async alreadyHandled(
    document: DocumentInfo,
    destination: string
  ): Promise<'skipped_processed' | 'skipped_stamped_reconciled' | null> {
    if (await this.deps.ledger.has(document.sha256)) {
      return 'skipped_processed';
    }
    if ((await readStamp(destination)) === document.sha256) {
      await this.deps.ledger.appendIfMissing(this.ledgerEntry(document));
      logger.info(
        { event: 'ingest.document.reconciled', name: document.name, sha256: document.sha256 },
        `${document.name}: recorded in ledger from its stamp`
      );
      return 'skipped_stamped_reconciled';
    }
    return null;
  }

  private async ingest(document: DocumentInfo, destination: string, tracker: StateTracker): Promise<ProcessResult> {
    const { path, name, sha256 } = document;

    // Another worker may have finished between the first check and the guard
    const earlier = await this.alreadyHandled(document, destination);
    if (earlier) {
      return this.skip(earlier, path, name, tracker);
    }

    const progress = await this.beginExtraction(document, destination);
    tracker.to('EXTRACTING');
    let files: string[];
    let metadata: DocumentMetadata;
    try {
      files = await this.deps.extractor.extract(path, destination);
      metadata = await collectDocumentMetadata(path, name, this.deps.metadata);
    } catch (error) {
      throw asDocumentFailure(error, path);
    }

    const recorded = await this.deps.objects.rowKeysForDocument(name, progress.baselineRows);
    const objectFiles = files.filter((file) => !isExtractionMarker(basename(file))).sort();
    let rowsAppended = 0;

    for (const file of objectFiles) {
      const object = await this.describeObject(sha256, file);
      if (!recorded.has(objectRowKey(object.objectPath, object.sha256))) {
        await this.deps.objects.append([{ metadata, documentName: name, object }]);
        rowsAppended++;
      }
      await this.deps.dedup.put(object.sha256, file);
    }
    tracker.to('ROWS_EMITTED');

    await writeStamp(destination, sha256);
    await finishExtraction(destination);
    tracker.to('STAMPED');

    await this.deps.ledger.appendIfMissing(this.ledgerEntry(document));
    tracker.to('LEDGERED');

    await this.deps.counts.rebuild();
    const rowsRecorded = (await this.deps.objects.countRowsForDocument(name)) - progress.baselineRows;

    logger.info(
      {
        event: 'ingest.document.done',
        name,
        sha256,
        objects: objectFiles.length,
        rowsAppended,
        rowsRecorded,
        resumedRows: objectFiles.length - rowsAppended,
      },
      `${name}: ${rowsRecorded} object rows recorded`
    );
    return { outcome: 'done', path, name, sha256, rowsAppended, rowsRecorded };
  }

  /**
   * Resume an unstamped attempt at the same content, or start a new one in an
   * emptied directory so nothing left by an earlier version of the file is reused
   */
  private async beginExtraction(document: DocumentInfo, destination: string): Promise<ExtractionProgress> {
    const previous = await readExtractionProgress(destination);
    if (previous && previous.sha256 === document.sha256) {
      logger.info(
        { event: 'ingest.document.resumed', name: document.name, sha256: document.sha256 },
        `${document.name}: resuming an interrupted extraction`
      );
      return previous;
    }

    const progress = {
      sha256: document.sha256,
      baselineRows: await this.deps.objects.countRowsForDocument(document.name),
    };
    await startExtraction(destination, progress);
    return progress;
  }

  private async describeObject(documentSha256: string, file: string): Promise<ExtractedObject> {
    try {
      const extension = objectExtension(file);
      const [sha256, fontName] = await Promise.all([
        this.deps.hasher.hashFile(file),
        isFontExtension(extension) ? this.deps.metadata.fontName.getFontName(file) : Promise.resolve(''),
      ]);
      return {
        documentSha256,
        objectPath: relative(this.deps.layout.objectsDir, file).split(sep).join('/'),
        sha256,
        extension,
        fontName,
      };
    } catch (error) {
      throw asDocumentFailure(error, file);
    }
  }

  private ledgerEntry(document: DocumentInfo): LedgerEntry {
    return {
      sha256: document.sha256,
      name: document.name,
      bytes: document.bytes,
      mtime: document.mtime,
      completedAt: ledgerTimestamp(),
    };
  }

  private skip(
    outcome: Exclude<DocumentOutcome, 'done' | 'failed'>,
    path: string,
    name: string,
    tracker: StateTracker
  ): ProcessResult {
    tracker.to(SKIP_STATES[outcome]);
    logger.info(
      { event: 'ingest.document.skipped', outcome, name, sha256: tracker.sha256 },
      `${name}: ${outcome.replace(/_/g, ' ')}`
    );
    return { outcome, path, name, sha256: tracker.sha256, rowsAppended: 0 };
  }
}
