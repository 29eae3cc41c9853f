import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SchemaMismatchError, emptySignatureBlocks, type ObjectRow } from '@objledger/core';
import { LockDirectory } from './locks.js';
import {
  LEGACY_OBJECTS_HEADER,
  OBJECTS_COLUMNS,
  OBJECTS_HEADER,
  ObjectsTable,
  detectObjectsSchema,
  formatObjectRow,
  migrateObjectsContent,
  objectRowKey,
} from './objects-table.js';

function row(documentName: string, objectPath: string, sha256: string): ObjectRow {
  const signatures = emptySignatureBlocks();
  signatures[0] = { commonName: 'Judge One', signingTime: '2024-04-11 08:35:56', byteRanges: '[0 - 10]' };
  signatures[3] = { commonName: 'Clerk Four', signingTime: '', byteRanges: '' };
  return {
    documentName,
    metadata: {
      filing: { caseNumber: '2024-001', filingType: 'Order', filingDate: '2024-05-01' },
      author: 'Court',
      creator: 'Writer',
      signatures,
    },
    object: { documentSha256: 'd'.repeat(64), objectPath, sha256, extension: '.png', fontName: '' },
  };
}

const LEGACY_ROW_A = 'aaa\tfirst.pdf\tfirst/image-0001.png\t.png\t';
const LEGACY_ROW_B = 'bbb\tfirst.pdf\tfirst/font-0002.ttf\t.ttf\tDejaVu Sans';

describe('objects table schema', () => {
  it('has 22 columns', () => {
    expect(OBJECTS_COLUMNS).toHaveLength(22);
    expect(OBJECTS_HEADER.split('\t')).toHaveLength(22);
  });

  it('detects the schema from the header line', () => {
    expect(detectObjectsSchema('')).toBe('empty');
    expect(detectObjectsSchema(`${OBJECTS_HEADER}\n`)).toBe('current');
    expect(detectObjectsSchema(`${LEGACY_OBJECTS_HEADER}\r\n${LEGACY_ROW_A}\r\n`)).toBe('legacy');
    expect(detectObjectsSchema('hash\tname\n')).toBe('custom');
  });

  it('pads legacy rows with 3 leading and 14 trailing blanks, keeping order', () => {
    const legacy = `${LEGACY_OBJECTS_HEADER}\n${LEGACY_ROW_A}\n\n${LEGACY_ROW_B}\n`;

    const { content, migrated } = migrateObjectsContent(legacy);

    expect(migrated).toBe(true);
    const lines = content.split('\n');
    expect(lines).toEqual([
      OBJECTS_HEADER,
      `\t\t\t${LEGACY_ROW_A}${'\t'.repeat(14)}`,
      `\t\t\t${LEGACY_ROW_B}${'\t'.repeat(14)}`,
      '',
    ]);
    expect(lines[1].split('\t')).toHaveLength(22);
    expect(lines[2].split('\t')[3]).toBe('bbb');
    expect(lines[2].split('\t')[7]).toBe('DejaVu Sans');
  });

  it('is a no-op on an already migrated table', () => {
    const once = migrateObjectsContent(`${LEGACY_OBJECTS_HEADER}\n${LEGACY_ROW_A}\n`).content;
    const twice = migrateObjectsContent(once);

    expect(twice.migrated).toBe(false);
    expect(twice.content).toBe(once);
  });

  it('leaves a custom header untouched', () => {
    const custom = 'Hash\tWhere\nabc\tsomewhere\n';
    expect(migrateObjectsContent(custom)).toEqual({ content: custom, migrated: false });
  });

  it('refuses a legacy row with the wrong field count', () => {
    const broken = `${LEGACY_OBJECTS_HEADER}\n${LEGACY_ROW_A}\nonly\ttwo\n`;
    expect(() => migrateObjectsContent(broken)).toThrow(SchemaMismatchError);
    expect(() => migrateObjectsContent(broken)).toThrow('row 3 has 2 fields');
  });

  it('formats rows in column order with tabs and newlines flattened', () => {
    const fields = formatObjectRow(row('MCRO\tx.pdf', 'dir/image-0001.png', 'e'.repeat(64))).split('\t');

    expect(fields).toHaveLength(22);
    expect(fields.slice(0, 8)).toEqual([
      '2024-001',
      'Order',
      '2024-05-01',
      'e'.repeat(64),
      'MCRO x.pdf',
      'dir/image-0001.png',
      '.png',
      '',
    ]);
    expect(fields.slice(8, 14)).toEqual(['Judge One', '', 'Court', 'Writer', '', 'Clerk Four']);
    expect(fields.slice(14, 18)).toEqual(['2024-04-11 08:35:56', '', '', '']);
    expect(fields.slice(18)).toEqual(['[0 - 10]', '', '', '']);
  });
});

describe('ObjectsTable', () => {
  let dir: string;
  let table: ObjectsTable;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'objledger-objects-'));
    table = new ObjectsTable(join(dir, 'objects.tsv'), new LockDirectory(dir));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the header on a missing table', async () => {
    expect(await table.ensureSchema()).toBe('empty');
    expect(await readFile(table.path, 'utf8')).toBe(`${OBJECTS_HEADER}\n`);
  });

  it('migrates a legacy file once', async () => {
    await writeFile(table.path, `${LEGACY_OBJECTS_HEADER}\n${LEGACY_ROW_A}\n`);

    expect(await table.ensureSchema()).toBe('legacy');
    const migrated = await readFile(table.path, 'utf8');
    expect(migrated).toBe(`${OBJECTS_HEADER}\n\t\t\t${LEGACY_ROW_A}${'\t'.repeat(14)}\n`);

    expect(await table.ensureSchema()).toBe('current');
    expect(await readFile(table.path, 'utf8')).toBe(migrated);
  });

  it('keeps a custom header and still appends', async () => {
    await writeFile(table.path, 'Hash\tWhere\n');

    expect(await table.ensureSchema()).toBe('custom');
    await table.append([row('a.pdf', 'a/x.png', 'f'.repeat(64))]);

    const lines = (await readFile(table.path, 'utf8')).split('\n');
    expect(lines[0]).toBe('Hash\tWhere');
    expect(lines[1].split('\t')).toHaveLength(22);
  });

  it('terminates a torn last line before appending', async () => {
    await writeFile(table.path, `${OBJECTS_HEADER}\npartial\trow`);

    await table.append([row('a.pdf', 'a/x.png', 'f'.repeat(64))]);

    const lines = (await readFile(table.path, 'utf8')).split('\n');
    expect(lines[1]).toBe('partial\trow');
    expect(lines[2].split('\t')[3]).toBe('f'.repeat(64));
    expect(lines[3]).toBe('');
  });

  it('finds rows already recorded for a document', async () => {
    await table.ensureSchema();
    await table.append([
      row('a.pdf', 'a_1/x.png', '1'.repeat(64)),
      row('a.pdf', 'a_1/y.png', '2'.repeat(64)),
      row('b.pdf', 'b_1/x.png', '1'.repeat(64)),
    ]);

    const keys = await table.rowKeysForDocument('a.pdf');
    expect([...keys]).toEqual([objectRowKey('a_1/x.png', '1'.repeat(64)), objectRowKey('a_1/y.png', '2'.repeat(64))]);
    expect(await table.countRowsForDocument('a.pdf')).toBe(2);
    expect(await table.countRowsForDocument('b.pdf')).toBe(1);
    expect(await table.countRowsForDocument('c.pdf')).toBe(0);
  });

  it('leaves out rows written before a given count', async () => {
    await table.ensureSchema();
    await table.append([
      row('a.pdf', 'a_1/x.png', '1'.repeat(64)),
      row('b.pdf', 'b_1/x.png', '1'.repeat(64)),
      row('a.pdf', 'a_1/x.png', '3'.repeat(64)),
    ]);

    const keys = await table.rowKeysForDocument('a.pdf', 1);
    expect([...keys]).toEqual([objectRowKey('a_1/x.png', '3'.repeat(64))]);
  });
});
