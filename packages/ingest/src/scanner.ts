/**
 * One catch-up pass over the input directory
 */

import pino from 'pino';
import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { join } from 'path';
import { hasErrorCode } from '@objledger/storage';
import type { DocumentCoordinator, DocumentOutcome, ProcessResult } from './coordinator.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'ingest.scanner' });

export interface ScanSummary {
  candidates: number;
  done: number;
  skipped: number;
  failed: number;
  results: ProcessResult[];
}

/**
 * `*.pdf` and `*.PDF`, hidden files excluded
 */
export function isCandidateName(name: string): boolean {
  return !name.startsWith('.') && (name.endsWith('.pdf') || name.endsWith('.PDF'));
}

/**
 * Candidate files directly inside `inputDir`, in name order; none when it is missing
 */
export async function listCandidates(inputDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(inputDir, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return [];
    throw error;
  }
  return entries
    .filter((entry) => entry.isFile() && isCandidateName(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => join(inputDir, name));
}

function isSkip(outcome: DocumentOutcome): boolean {
  return outcome.startsWith('skipped_');
}

export function summarize(results: ProcessResult[]): ScanSummary {
  return {
    candidates: results.length,
    done: results.filter((r) => r.outcome === 'done').length,
    skipped: results.filter((r) => isSkip(r.outcome)).length,
    failed: results.filter((r) => r.outcome === 'failed').length,
    results,
  };
}

/**
 * Process every candidate, one at a time. Fatal errors stop the scan.
 */
export async function scanOnce(coordinator: DocumentCoordinator, inputDir: string): Promise<ScanSummary> {
  const candidates = await listCandidates(inputDir);
  if (candidates.length === 0) {
    logger.info({ event: 'ingest.scan.empty', inputDir }, `no PDFs found in ${inputDir}`);
    return summarize([]);
  }

  const startTime = Date.now();
  const results: ProcessResult[] = [];
  for (const path of candidates) {
    results.push(await coordinator.processDocument(path));
  }

  const summary = summarize(results);
  logger.info(
    {
      event: 'ingest.scan.complete',
      inputDir,
      candidates: summary.candidates,
      done: summary.done,
      skipped: summary.skipped,
      failed: summary.failed,
      durationMs: Date.now() - startTime,
    },
    `Scan complete: ${summary.done} done, ${summary.skipped} skipped, ${summary.failed} failed`
  );
  return summary;
}
