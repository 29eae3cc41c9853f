import { createHash } from 'crypto';
import { extname } from 'path';

export const FONT_EXTENSIONS: ReadonlySet<string> = new Set(['.ttf', '.otf', '.ttc', '.woff', '.woff2', '.pfb', '.pfa']);

// Longer suffixes are not file types (e.g. a dotted object name)
export const MAX_EXTENSION_LENGTH = 11;

export const STAMP_FILE_NAME = '.processed.sha';

// Present while an extraction has not yet been stamped
export const PROGRESS_FILE_NAME = '.inprogress.sha';

/**
 * True for the bookkeeping files kept in an extraction directory, which are not objects
 */
export function isExtractionMarker(fileName: string): boolean {
  return fileName === STAMP_FILE_NAME || fileName === PROGRESS_FILE_NAME;
}

/**
 * Lower-cased extension including the dot, or '' when absent or implausibly long
 */
export function objectExtension(path: string): string {
  const ext = extname(path).toLowerCase();
  if (ext === '.' || ext.length > MAX_EXTENSION_LENGTH) return '';
  return ext;
}

export function isFontExtension(ext: string): boolean {
  return FONT_EXTENSIONS.has(ext);
}

/**
 * Filesystem-safe, collision-resistant directory name for a document.
 *
 * The readable part loses characters outside [A-Za-z0-9._-]; the suffix is taken
 * from SHA-256 of the untouched name, so names that clean up identically still
 * get distinct directories.
 */
export function safeDocumentName(name: string): string {
  const readable = name.replace(/\.pdf$/i, '').replace(/[^A-Za-z0-9._-]/g, '_');
  const suffix = createHash('sha256').update(name, 'utf8').digest('hex').substring(0, 8);
  return `${readable || 'document'}_${suffix}`;
}

const SHA256_HEX = /^[0-9a-f]{64}$/;

export function isSha256Hex(value: string): boolean {
  return SHA256_HEX.test(value);
}
