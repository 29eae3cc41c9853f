/**
 * Shared domain types for the ingest pipeline
 */

/** A PDF observed stable on disk and identified by its content hash. */
export interface DocumentInfo {
  path: string;
  name: string;
  sha256: string;
  bytes: number;
  mtime: number; // epoch seconds
}

export interface FilingAttributes {
  caseNumber: string;
  filingType: string;
  filingDate: string;
}

export interface SignatureBlock {
  commonName: string;
  signingTime: string;
  byteRanges: string;
}

/** Exactly four blocks; unused ones are blank. */
export type SignatureBlocks = [SignatureBlock, SignatureBlock, SignatureBlock, SignatureBlock];

export interface AuthorCreator {
  author: string;
  creator: string;
}

/** Per-document fields repeated on every object row. */
export interface DocumentMetadata extends AuthorCreator {
  filing: FilingAttributes;
  signatures: SignatureBlocks;
}

export interface ExtractedObject {
  documentSha256: string;
  objectPath: string; // relative to the objects root
  sha256: string;
  extension: string;
  fontName: string;
}

/** One denormalized main-table row: document metadata plus one extracted object. */
export interface ObjectRow {
  metadata: DocumentMetadata;
  documentName: string;
  object: ExtractedObject;
}

export interface LedgerEntry {
  sha256: string;
  name: string;
  bytes: number;
  mtime: number;
  completedAt: string; // ISO-8601 UTC, second precision
}

export interface HashCount {
  sha256: string;
  count: number;
}
