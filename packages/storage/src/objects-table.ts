/**
 * Main table: one append-only TSV row per extracted object
 */

import pino from 'pino';
import { SchemaMismatchError, type ObjectRow } from '@objledger/core';
import { appendLines, atomicWriteFile, completeLines, readTextOrEmpty, tsvField } from './fs-utils.js';
import type { LockDirectory } from './locks.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'storage.objects' });

export const OBJECTS_COLUMNS = [
  'Case Number',
  'Filing Type',
  'Filing Date',
  'SHA256 Hash Value',
  'Pdf File Name',
  'Pdf Internal Object Path',
  'Object Type',
  'Font Name',
  'Sig #1 Common Name',
  'Sig #2 Common Name',
  'Author',
  'Creator',
  'Sig #3 Common Name',
  'Sig #4 Common Name',
  'Sig #1 Signing Time',
  'Sig #2 Signing Time',
  'Sig #3 Signing Time',
  'Sig #4 Signing Time',
  'Sig #1 Byte Ranges',
  'Sig #2 Byte Ranges',
  'Sig #3 Byte Ranges',
  'Sig #4 Byte Ranges',
] as const;

export const OBJECTS_HEADER = OBJECTS_COLUMNS.join('\t');

// The five-column layout written before filing and signature metadata existed
export const LEGACY_OBJECTS_COLUMNS = [
  'SHA256 Hash Value',
  'Pdf File Name',
  'Pdf Internal Object Path',
  'Object Type',
  'Font Name',
] as const;

export const LEGACY_OBJECTS_HEADER = LEGACY_OBJECTS_COLUMNS.join('\t');

/** Blank fields placed before / after a legacy row when migrating. */
export const LEGACY_LEADING_BLANKS = 3;
export const LEGACY_TRAILING_BLANKS = 14;

/** Zero-based column positions used by readers. */
export const HASH_COLUMN = 3;
export const DOCUMENT_NAME_COLUMN = 4;
export const OBJECT_PATH_COLUMN = 5;

export type ObjectsSchema = 'current' | 'legacy' | 'custom' | 'empty';

export function detectObjectsSchema(content: string): ObjectsSchema {
  if (content.trim().length === 0) return 'empty';
  const newline = content.indexOf('\n');
  const header = (newline === -1 ? content : content.substring(0, newline)).replace(/\r$/, '');
  if (header === OBJECTS_HEADER) return 'current';
  if (header === LEGACY_OBJECTS_HEADER) return 'legacy';
  return 'custom';
}

/**
 * Rewrite a legacy table in the current schema. Row order is kept; blank lines
 * carry nothing and are dropped. Anything other than a legacy table comes back
 * unchanged.
 */
export function migrateObjectsContent(content: string): { content: string; migrated: boolean } {
  if (detectObjectsSchema(content) !== 'legacy') {
    return { content, migrated: false };
  }

  const lines = content.split('\n').map((line) => line.replace(/\r$/, ''));
  const leading = '\t'.repeat(LEGACY_LEADING_BLANKS);
  const trailing = '\t'.repeat(LEGACY_TRAILING_BLANKS);
  const out = [OBJECTS_HEADER];

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.length === 0) continue;
    const fieldCount = line.split('\t').length;
    if (fieldCount !== LEGACY_OBJECTS_COLUMNS.length) {
      throw new SchemaMismatchError(
        `Legacy objects table row ${i + 1} has ${fieldCount} fields, expected ${LEGACY_OBJECTS_COLUMNS.length}`,
        { context: { line: i + 1, fieldCount } }
      );
    }
    out.push(`${leading}${line}${trailing}`);
  }

  return { content: out.map((line) => `${line}\n`).join(''), migrated: true };
}

/**
 * Serialize one row in column order
 */
export function formatObjectRow(row: ObjectRow): string {
  const { metadata, object } = row;
  const [sig1, sig2, sig3, sig4] = metadata.signatures;
  const fields = [
    metadata.filing.caseNumber,
    metadata.filing.filingType,
    metadata.filing.filingDate,
    object.sha256,
    row.documentName,
    object.objectPath,
    object.extension,
    object.fontName,
    sig1.commonName,
    sig2.commonName,
    metadata.author,
    metadata.creator,
    sig3.commonName,
    sig4.commonName,
    sig1.signingTime,
    sig2.signingTime,
    sig3.signingTime,
    sig4.signingTime,
    sig1.byteRanges,
    sig2.byteRanges,
    sig3.byteRanges,
    sig4.byteRanges,
  ];
  return fields.map(tsvField).join('\t');
}

/** Key identifying an object row of one document: path plus content hash. */
export function objectRowKey(objectPath: string, sha256: string): string {
  return `${tsvField(objectPath)}\t${sha256}`;
}

export class ObjectsTable {
  constructor(readonly path: string, private readonly locks: LockDirectory) {}

  /**
   * Create the header on a new table, or migrate a legacy one, before any append.
   * Custom headers are left alone.
   */
  async ensureSchema(): Promise<ObjectsSchema> {
    return this.locks.withLock('objects', async () => {
      const content = await readTextOrEmpty(this.path);
      const schema = detectObjectsSchema(content);

      if (schema === 'empty') {
        await atomicWriteFile(this.path, `${OBJECTS_HEADER}\n`);
        logger.info({ event: 'storage.objects.created', path: this.path }, 'Objects table created');
      } else if (schema === 'legacy') {
        const migrated = migrateObjectsContent(content);
        await atomicWriteFile(this.path, migrated.content);
        logger.info({ event: 'storage.objects.migrated', path: this.path }, 'Objects table migrated to current schema');
      } else if (schema === 'custom') {
        logger.warn(
          { event: 'storage.objects.custom_header', path: this.path },
          'Objects table has a custom header; appending current-schema rows without migrating'
        );
      }
      return schema;
    });
  }

  async append(rows: readonly ObjectRow[]): Promise<void> {
    if (rows.length === 0) return;
    await this.locks.withLock('objects', () => appendLines(this.path, rows.map(formatObjectRow)));
  }

  /**
   * Data rows that were fully written (header excluded), split into fields
   */
  async readRows(): Promise<string[][]> {
    const content = await readTextOrEmpty(this.path);
    return completeLines(content)
      .slice(1)
      .filter((line) => line.length > 0)
      .map((line) => line.split('\t'));
  }

  /**
   * Keys of rows recorded for a document name, ignoring the first `skipRows`
   * of them (rows written for earlier content under the same name)
   */
  async rowKeysForDocument(documentName: string, skipRows = 0): Promise<Set<string>> {
    const name = tsvField(documentName);
    const keys = new Set<string>();
    let seen = 0;
    for (const fields of await this.readRows()) {
      if (fields[DOCUMENT_NAME_COLUMN] !== name) continue;
      seen++;
      if (seen > skipRows && fields.length > OBJECT_PATH_COLUMN) {
        keys.add(objectRowKey(fields[OBJECT_PATH_COLUMN], fields[HASH_COLUMN]));
      }
    }
    return keys;
  }

  async countRowsForDocument(documentName: string): Promise<number> {
    const name = tsvField(documentName);
    const rows = await this.readRows();
    return rows.filter((fields) => fields[DOCUMENT_NAME_COLUMN] === name).length;
  }
}
