import type { FilingAttributes } from './types.js';

export const FILING_PREFIX = 'MCRO_';
export const FILING_DELIMITER = '_';

const PDF_SUFFIX = /\.pdf$/i;

export const EMPTY_FILING: Readonly<FilingAttributes> = Object.freeze({
  caseNumber: '',
  filingType: '',
  filingDate: '',
});

/**
 * Split a `MCRO_<case>_<type>_<date>[_...].pdf` base name into filing attributes.
 *
 * Only the last split field can carry the `.pdf` suffix, so it is stripped from
 * that field alone. Names without the prefix yield three blanks.
 */
export function parseFilingName(baseName: string): FilingAttributes {
  if (!baseName.startsWith(FILING_PREFIX)) {
    return { ...EMPTY_FILING };
  }

  const fields = baseName.slice(FILING_PREFIX.length).split(FILING_DELIMITER);
  const last = fields.length - 1;
  fields[last] = fields[last].replace(PDF_SUFFIX, '');

  const [caseNumber = '', filingType = '', filingDate = ''] = fields;
  return { caseNumber, filingType, filingDate };
}
