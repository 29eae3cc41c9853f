/**
 * Object extraction with `mutool extract`, which writes into its working directory
 */

import pino from 'pino';
import { mkdir } from 'fs/promises';
import { basename, resolve } from 'path';
import { ExtractionFailureError, ToolUnavailableError, isExtractionMarker, type ObjectExtractor } from '@objledger/core';
import { listFilesRecursive } from './files.js';
import { runCommand, type CommandRunner } from './run.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'tools.mutool' });

export class MutoolExtractor implements ObjectExtractor {
  constructor(
    private readonly command: string = 'mutool',
    private readonly run: CommandRunner = runCommand
  ) {}

  async extract(documentPath: string, destinationDir: string): Promise<string[]> {
    await mkdir(destinationDir, { recursive: true });
    const result = await this.run(this.command, ['extract', resolve(documentPath)], { cwd: destinationDir });

    if (result.notFound) {
      throw new ToolUnavailableError(this.command);
    }
    if (result.code !== 0) {
      throw new ExtractionFailureError(`${this.command} extract exited with ${result.code}: ${result.stderr.trim()}`, {
        context: { document: documentPath, code: result.code },
      });
    }

    const files = (await listFilesRecursive(destinationDir)).filter((path) => !isExtractionMarker(basename(path)));
    logger.debug({ event: 'tools.mutool.extracted', document: documentPath, files: files.length }, 'Extracted objects');
    return files;
  }
}
