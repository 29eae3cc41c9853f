import { parseFilingName, parseSignatureReport, type DocumentMetadata, type MetadataProviders } from '@objledger/core';

/**
 * Fields shared by every row of one document, gathered once per document
 */
export async function collectDocumentMetadata(
  documentPath: string,
  documentName: string,
  providers: MetadataProviders
): Promise<DocumentMetadata> {
  const [report, authorCreator] = await Promise.all([
    providers.signatureReport.getSignatureReport(documentPath),
    providers.authorCreator.getAuthorCreator(documentPath),
  ]);

  return {
    filing: parseFilingName(documentName),
    signatures: parseSignatureReport(report),
    author: authorCreator.author,
    creator: authorCreator.creator,
  };
}
