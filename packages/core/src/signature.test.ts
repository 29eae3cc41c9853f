import { describe, it, expect } from 'vitest';
import { normalizeSigningTime, parseSignatureReport } from './signature.js';

const BLANK = { commonName: '', signingTime: '', byteRanges: '' };

describe('normalizeSigningTime', () => {
  it('normalizes the pdfsig format', () => {
    expect(normalizeSigningTime('Apr 11 2024 08:35:56')).toBe('2024-04-11 08:35:56');
  });

  it('accepts minutes-only and ctime forms', () => {
    expect(normalizeSigningTime('Apr 11 2024 08:35')).toBe('2024-04-11 08:35:00');
    expect(normalizeSigningTime('Thu Apr 11 08:35:56 2024')).toBe('2024-04-11 08:35:56');
  });

  it('drops trailing zone tokens', () => {
    expect(normalizeSigningTime('Apr 11 2024 08:35:56 UTC')).toBe('2024-04-11 08:35:56');
  });

  it('collapses repeated whitespace', () => {
    expect(normalizeSigningTime('  Jan  2 2023   17:04:05 ')).toBe('2023-01-02 17:04:05');
  });

  it('keeps the raw text when nothing fits', () => {
    expect(normalizeSigningTime(' sometime last week ')).toBe('sometime last week');
  });
});

describe('parseSignatureReport', () => {
  it('fills two blocks and leaves a malformed field blank', () => {
    const report = [
      'Digital Signature Info of: filing.pdf',
      'Signature #1:',
      '  - Signer Certificate Common Name: Judge One',
      '  - Signer full Distinguished Name: CN=Judge One,O=Court',
      '  - Signing Time: Apr 11 2024 08:35:56',
      '  - Signing Hash Algorithm: SHA-256',
      '  - Signed Ranges: [0 - 1234], [5678 - 9999]',
      'Signature #2:',
      '  - Signer Certificate Common Name: Clerk Two',
      '  - Signing Time Apr 12 2024 09:00:00',
      '  - Signed Ranges: [0 - 100], [200 - 300]',
    ].join('\n');

    expect(parseSignatureReport(report)).toEqual([
      { commonName: 'Judge One', signingTime: '2024-04-11 08:35:56', byteRanges: '[0 - 1234], [5678 - 9999]' },
      { commonName: 'Clerk Two', signingTime: '', byteRanges: '[0 - 100], [200 - 300]' },
      BLANK,
      BLANK,
    ]);
  });

  it('keeps only the first four blocks', () => {
    const report = [1, 2, 3, 4, 5]
      .map((n) => `Signature #${n}:\n  - Signer Certificate Common Name: Signer ${n}`)
      .join('\n');

    const blocks = parseSignatureReport(report);
    expect(blocks.map((block) => block.commonName)).toEqual(['Signer 1', 'Signer 2', 'Signer 3', 'Signer 4']);
  });

  it('ignores fields after an out-of-range block', () => {
    const report = [
      'Signature #1:',
      '  - Signer Certificate Common Name: First',
      'Signature #5:',
      '  - Signer Certificate Common Name: Fifth',
    ].join('\n');

    expect(parseSignatureReport(report)[0].commonName).toBe('First');
  });

  it('ignores field lines outside any block', () => {
    expect(parseSignatureReport('  - Signer Certificate Common Name: Nobody\n')).toEqual([BLANK, BLANK, BLANK, BLANK]);
  });

  it('keeps an unparseable signing time verbatim', () => {
    const blocks = parseSignatureReport('Signature #3:\r\n  - Signing Time: not a date\r\n');
    expect(blocks[2]).toEqual({ commonName: '', signingTime: 'not a date', byteRanges: '' });
  });

  it('returns blanks for an empty or missing report', () => {
    expect(parseSignatureReport('')).toEqual([BLANK, BLANK, BLANK, BLANK]);
    expect(parseSignatureReport(undefined)).toEqual([BLANK, BLANK, BLANK, BLANK]);
    expect(parseSignatureReport('File has no signatures\n')).toEqual([BLANK, BLANK, BLANK, BLANK]);
  });
});
