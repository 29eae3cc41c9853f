/**
 * Author and Creator via `exiftool -j`
 */

import pino from 'pino';
import { z } from 'zod';
import type { AuthorCreator, AuthorCreatorProvider } from '@objledger/core';
import { reportUnavailable } from './probe.js';
import { runCommand, type CommandRunner } from './run.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'tools.exiftool' });

const EMPTY: AuthorCreator = { author: '', creator: '' };

// exiftool emits numbers for numeric-looking values and arrays for repeated tags
const TagValueSchema = z.union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))]).optional();

const ExiftoolOutputSchema = z.array(
  z.object({
    Author: TagValueSchema,
    Creator: TagValueSchema,
  })
);

function tagText(value: z.infer<typeof TagValueSchema>): string {
  if (value === undefined) return '';
  if (Array.isArray(value)) return value.map(String).join(', ').trim();
  return String(value).trim();
}

/**
 * Author and Creator from `exiftool -j` output; blanks when absent or unparseable
 */
export function parseExiftoolJson(stdout: string): AuthorCreator {
  if (stdout.trim().length === 0) return EMPTY;

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    logger.debug({ event: 'tools.exiftool.unparseable', error: String(error) }, 'exiftool output is not JSON');
    return EMPTY;
  }

  const parsed = ExiftoolOutputSchema.safeParse(raw);
  if (!parsed.success || parsed.data.length === 0) return EMPTY;
  const [first] = parsed.data;
  return { author: tagText(first.Author), creator: tagText(first.Creator) };
}

export class ExiftoolAuthorCreatorProvider implements AuthorCreatorProvider {
  constructor(
    private readonly command: string = 'exiftool',
    private readonly run: CommandRunner = runCommand
  ) {}

  async getAuthorCreator(documentPath: string): Promise<AuthorCreator> {
    const result = await this.run(this.command, ['-j', '-Author', '-Creator', documentPath]);
    if (result.notFound) {
      reportUnavailable(this.command, 'Author/Creator');
      return EMPTY;
    }
    return parseExiftoolJson(result.stdout);
  }
}
