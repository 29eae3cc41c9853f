/**
 * Small file helpers shared by the tables and stores
 */

import { randomBytes } from 'crypto';
import { open, readFile, rename, unlink, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return isErrnoException(err) && err.code === code;
}

/**
 * Unique sibling path for a temp file; the leading dot keeps it out of globs
 */
export function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.tmp-${process.pid}-${randomBytes(4).toString('hex')}`);
}

/**
 * Write via temp file + rename so readers never see a partial file
 */
export async function atomicWriteFile(path: string, content: string): Promise<void> {
  const tmp = tempPathFor(path);
  try {
    await writeFile(tmp, content, 'utf8');
    await rename(tmp, path);
  } catch (error) {
    await removeIfExists(tmp);
    throw error;
  }
}

export async function removeIfExists(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return false;
    throw error;
  }
}

/**
 * Read a text file, treating a missing file as empty
 */
export async function readTextOrEmpty(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return '';
    throw error;
  }
}

/**
 * Lines that were fully written. A trailing fragment without its newline is a
 * torn append and is left out.
 */
export function completeLines(content: string): string[] {
  const end = content.lastIndexOf('\n');
  if (end === -1) return [];
  return content
    .substring(0, end)
    .split('\n')
    .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Append whole lines. If the file ends in a torn line, it is terminated first so
 * the new lines start cleanly.
 */
export async function appendLines(path: string, lines: readonly string[]): Promise<void> {
  if (lines.length === 0) return;

  const handle = await open(path, 'a+');
  try {
    const { size } = await handle.stat();
    let prefix = '';
    if (size > 0) {
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      if (last[0] !== 0x0a) prefix = '\n';
    }
    await handle.appendFile(prefix + lines.map((line) => `${line}\n`).join(''), 'utf8');
  } finally {
    await handle.close();
  }
}

/**
 * Fields are tab-separated and rows newline-terminated, so neither may appear
 * inside a value.
 */
export function tsvField(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}
