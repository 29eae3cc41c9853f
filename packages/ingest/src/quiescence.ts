/**
 * Wait for a file to stop growing before it is hashed
 */

import { stat } from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import { TransientIOError } from '@objledger/core';
import { hasErrorCode } from '@objledger/storage';

/** Size sampled for a file that does not exist (yet, or any more). */
export const MISSING_SIZE = -1;

export interface QuiescenceOptions {
  intervalMs: number;
  attempts: number;
  /** Returns the file size; defaults to fs.stat. */
  sizeOf?: (path: string) => Promise<number>;
  sleep?: (ms: number) => Promise<void>;
}

export interface QuiescenceResult {
  /** Two consecutive samples matched. */
  stable: boolean;
  /** Last sampled size, MISSING_SIZE when the file was gone. */
  size: number;
  samples: number;
}

export const DEFAULT_QUIESCENCE: QuiescenceOptions = { intervalMs: 300, attempts: 10 };

async function statSize(path: string): Promise<number> {
  return (await stat(path)).size;
}

async function sample(path: string, sizeOf: (path: string) => Promise<number>): Promise<number> {
  try {
    return await sizeOf(path);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return MISSING_SIZE;
    throw new TransientIOError(`Cannot stat ${path}`, { cause: error, context: { path } });
  }
}

/**
 * Sample the size until two consecutive samples agree or the attempts run out.
 * Giving up is not an error: the caller goes ahead with the last size.
 */
export async function waitForQuiescence(path: string, options: QuiescenceOptions = DEFAULT_QUIESCENCE): Promise<QuiescenceResult> {
  const sizeOf = options.sizeOf ?? statSize;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const attempts = Math.max(1, options.attempts);

  let previous: number | null = null;
  let size = MISSING_SIZE;
  for (let samples = 1; samples <= attempts; samples++) {
    size = await sample(path, sizeOf);
    if (previous !== null && size === previous) {
      return { stable: true, size, samples };
    }
    previous = size;
    if (samples < attempts) {
      await sleep(options.intervalMs);
    }
  }
  return { stable: false, size, samples: attempts };
}
