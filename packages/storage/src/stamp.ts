import { mkdir, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { PROGRESS_FILE_NAME, STAMP_FILE_NAME, isSha256Hex } from '@objledger/core';
import { atomicWriteFile, hasErrorCode, removeIfExists } from './fs-utils.js';

export function stampPath(destinationDir: string): string {
  return join(destinationDir, STAMP_FILE_NAME);
}

export function progressPath(destinationDir: string): string {
  return join(destinationDir, PROGRESS_FILE_NAME);
}

async function readMarker(path: string): Promise<string | null> {
  try {
    const content = await readFile(path, 'utf8');
    return content.trim() || null;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) return null;
    throw error;
  }
}

/**
 * Hash recorded by the stamp in an extraction directory, or null if there is none
 */
export async function readStamp(destinationDir: string): Promise<string | null> {
  return readMarker(stampPath(destinationDir));
}

export async function writeStamp(destinationDir: string, sha256: string): Promise<void> {
  await atomicWriteFile(stampPath(destinationDir), `${sha256}\n`);
}

/**
 * An extraction that has started but is not stamped yet. `baselineRows` is the
 * number of main-table rows carrying the document name before the attempt
 * began; rows past it belong to this content.
 */
export interface ExtractionProgress {
  sha256: string;
  baselineRows: number;
}

export function parseExtractionProgress(content: string): ExtractionProgress | null {
  const [sha256, baseline, ...rest] = content.trim().split(/\s+/);
  if (rest.length > 0 || !sha256 || !isSha256Hex(sha256) || !baseline || !/^\d+$/.test(baseline)) {
    return null;
  }
  return { sha256, baselineRows: Number(baseline) };
}

export async function readExtractionProgress(destinationDir: string): Promise<ExtractionProgress | null> {
  const content = await readMarker(progressPath(destinationDir));
  return content === null ? null : parseExtractionProgress(content);
}

/**
 * Empty the extraction directory and record a new attempt in it
 */
export async function startExtraction(destinationDir: string, progress: ExtractionProgress): Promise<void> {
  await rm(destinationDir, { recursive: true, force: true });
  await mkdir(destinationDir, { recursive: true });
  await atomicWriteFile(progressPath(destinationDir), `${progress.sha256} ${progress.baselineRows}\n`);
}

export async function finishExtraction(destinationDir: string): Promise<void> {
  await removeIfExists(progressPath(destinationDir));
}
