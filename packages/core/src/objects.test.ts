import { describe, it, expect } from 'vitest';
import { isFontExtension, isSha256Hex, objectExtension, safeDocumentName } from './objects.js';

describe('objectExtension', () => {
  it('lower-cases and keeps the dot', () => {
    expect(objectExtension('/out/doc/image-0012.PNG')).toBe('.png');
    expect(objectExtension('font-0003.ttf')).toBe('.ttf');
  });

  it('is blank when there is no usable suffix', () => {
    expect(objectExtension('/out/doc/stream-0001')).toBe('');
    expect(objectExtension('/out/doc/.hidden')).toBe('');
    expect(objectExtension('/out/doc/trailing.')).toBe('');
    expect(objectExtension('/out/doc/x.averyverylongext')).toBe('');
  });
});

describe('isFontExtension', () => {
  it('recognizes font files only', () => {
    expect(isFontExtension('.woff2')).toBe(true);
    expect(isFontExtension('.pfa')).toBe(true);
    expect(isFontExtension('.png')).toBe(false);
    expect(isFontExtension('')).toBe(false);
  });
});

describe('safeDocumentName', () => {
  it('cleans the name and appends a digest of the original', () => {
    expect(safeDocumentName('My File.pdf')).toBe('My_File_554b8b09');
    expect(safeDocumentName('report.PDF')).toBe('report_200850b3');
    expect(safeDocumentName('a/b c.pdf')).toBe('a_b_c_14e3e03b');
  });

  it('keeps names that clean up identically apart', () => {
    expect(safeDocumentName('My_File.pdf')).toBe('My_File_60ebf82f');
    expect(safeDocumentName('My_File.pdf')).not.toBe(safeDocumentName('My File.pdf'));
  });
});

describe('isSha256Hex', () => {
  it('accepts lowercase 64-char hex only', () => {
    expect(isSha256Hex('a'.repeat(64))).toBe(true);
    expect(isSha256Hex('A'.repeat(64))).toBe(false);
    expect(isSha256Hex('a'.repeat(63))).toBe(false);
  });
});
