/**
 * Narrow interfaces for the external tools the pipeline drives.
 * Implementations live in @objledger/tools; tests substitute fakes.
 */

import type { AuthorCreator } from './types.js';

export interface ContentHasher {
  /** Hex digest of the whole file. */
  hashFile(path: string): Promise<string>;
}

export interface ObjectExtractor {
  /**
   * Explode a document into `destinationDir` and return the files written there.
   * Throws ExtractionFailureError when nothing usable was produced.
   */
  extract(documentPath: string, destinationDir: string): Promise<string[]>;
}

export interface AuthorCreatorProvider {
  getAuthorCreator(documentPath: string): Promise<AuthorCreator>;
}

export interface SignatureReportProvider {
  getSignatureReport(documentPath: string): Promise<string>;
}

export interface FontNameProvider {
  getFontName(fontPath: string): Promise<string>;
}

export interface MetadataProviders {
  authorCreator: AuthorCreatorProvider;
  signatureReport: SignatureReportProvider;
  fontName: FontNameProvider;
}
