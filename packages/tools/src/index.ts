/**
 * Adapters for the external tools behind the core capability interfaces
 */

import type { ToolCommands } from '@objledger/config';
import type { MetadataProviders } from '@objledger/core';
import { ExiftoolAuthorCreatorProvider } from './exiftool.js';
import { FontNameLookup } from './fonts.js';
import { PdfsigReportProvider } from './pdfsig.js';
import { runCommand, type CommandRunner } from './run.js';

export * from './run.js';
export * from './probe.js';
export * from './hash.js';
export * from './files.js';
export * from './mutool.js';
export * from './pdfsig.js';
export * from './exiftool.js';
export * from './fonts.js';

export function createMetadataProviders(tools: ToolCommands, run: CommandRunner = runCommand): MetadataProviders {
  return {
    authorCreator: new ExiftoolAuthorCreatorProvider(tools.exiftool, run),
    signatureReport: new PdfsigReportProvider(tools.pdfsig, run),
    fontName: new FontNameLookup({ otfinfo: tools.otfinfo, fcScan: tools.fcScan }, run),
  };
}
