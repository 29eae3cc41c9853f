/**
 * Line scanner over a `pdfsig` style signature report
 *
 * The main table has room for four signatures; later blocks are dropped.
 */

import moment from 'moment';
import type { SignatureBlock, SignatureBlocks } from './types.js';

export const MAX_SIGNATURES = 4;
export const SIGNING_TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const BLOCK_START = /^Signature\s+#(\d+):/;
const COMMON_NAME = /Signer\s+Certificate\s+Common\s+Name:\s*(.*)$/;
const SIGNING_TIME = /Signing\s+Time:\s*(.*)$/;
const SIGNED_RANGES = /Signed\s+Ranges:\s*(.*)$/;

const INPUT_TIME_FORMATS = [
  'MMM D YYYY HH:mm:ss',
  'MMM D YYYY HH:mm',
  'ddd MMM D HH:mm:ss YYYY',
  'ddd MMM D YYYY HH:mm:ss',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DDTHH:mm:ss',
];

type ScanState = { kind: 'outside' } | { kind: 'inside'; block: SignatureBlock };

export function emptySignatureBlocks(): SignatureBlocks {
  return [
    { commonName: '', signingTime: '', byteRanges: '' },
    { commonName: '', signingTime: '', byteRanges: '' },
    { commonName: '', signingTime: '', byteRanges: '' },
    { commonName: '', signingTime: '', byteRanges: '' },
  ];
}

/**
 * Normalize a signing time to `YYYY-MM-DD HH:mm:ss`, or return the trimmed raw text.
 * Trailing tokens such as a zone name are dropped one at a time until a format fits.
 */
export function normalizeSigningTime(raw: string): string {
  const trimmed = raw.trim().replace(/\s+/g, ' ');
  if (trimmed.length === 0) return '';

  const tokens = trimmed.split(' ');
  for (let end = tokens.length; end >= 1; end--) {
    const candidate = tokens.slice(0, end).join(' ');
    const parsed = moment(candidate, INPUT_TIME_FORMATS, 'en', true);
    if (parsed.isValid()) {
      return parsed.format(SIGNING_TIME_FORMAT);
    }
  }
  return trimmed;
}

/**
 * Parse up to four signature blocks. Missing or empty reports give blank blocks.
 */
export function parseSignatureReport(report: string | null | undefined): SignatureBlocks {
  const blocks = emptySignatureBlocks();
  if (!report) return blocks;

  let state: ScanState = { kind: 'outside' };

  for (const rawLine of report.split(/\r?\n/)) {
    const line = rawLine.trim();

    const start = BLOCK_START.exec(line);
    if (start) {
      const index = Number.parseInt(start[1], 10);
      state = index >= 1 && index <= MAX_SIGNATURES ? { kind: 'inside', block: blocks[index - 1] } : { kind: 'outside' };
      continue;
    }

    if (state.kind === 'outside') continue;

    const commonName = COMMON_NAME.exec(line);
    if (commonName) {
      state.block.commonName = commonName[1].trim();
      continue;
    }

    const signingTime = SIGNING_TIME.exec(line);
    if (signingTime) {
      state.block.signingTime = normalizeSigningTime(signingTime[1]);
      continue;
    }

    const ranges = SIGNED_RANGES.exec(line);
    if (ranges) {
      state.block.byteRanges = ranges[1].trim();
    }
  }

  return blocks;
}
