import type { SignatureReportProvider } from '@objledger/core';
import { reportUnavailable } from './probe.js';
import { runCommand, type CommandRunner } from './run.js';

/**
 * Raw `pdfsig` report. pdfsig exits non-zero for unsigned documents, so the
 * output is used whatever the status; a missing tool gives an empty report.
 */
export class PdfsigReportProvider implements SignatureReportProvider {
  constructor(
    private readonly command: string = 'pdfsig',
    private readonly run: CommandRunner = runCommand
  ) {}

  async getSignatureReport(documentPath: string): Promise<string> {
    const result = await this.run(this.command, [documentPath]);
    if (result.notFound) {
      reportUnavailable(this.command, 'signature fields');
      return '';
    }
    return result.stdout;
  }
}
