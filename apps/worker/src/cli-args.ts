/**
 * Command-line arguments of the objledger CLI
 */

export interface CliOptions {
  monitor: boolean;
  help: boolean;
  /** Polling interval for watch mode; also turns polling on. */
  pollSeconds?: number;
  rootDir?: string;
}

export type CliParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export const USAGE = `Usage: objledger [options]

Extract, hash and ledger the objects of every PDF in <root>/pdf.

Options:
  -m, --monitor        Catch up, then keep watching <root>/pdf for new files
      --poll <seconds> Watch by polling every <seconds> instead of file events
      --root <dir>     Ingest root (default: INGEST_ROOT or the current directory)
  -h, --help           Show this help

Layout under <root>:
  pdf/              incoming documents (*.pdf, *.PDF)
  pdf-objects/      one extraction directory per document
  hashed-objects/   one file per distinct object hash
  objects.tsv       one row per extracted object
  hash-count.tsv    occurrences of each object hash
  processed.tsv     ledger of completed documents
`;

export function parseCliArgs(argv: readonly string[]): CliParseResult {
  const options: CliOptions = { monitor: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-m' || arg === '--monitor') {
      options.monitor = true;
    } else if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '--poll') {
      const value = argv[i + 1];
      const seconds = value === undefined ? Number.NaN : Number(value);
      if (!Number.isFinite(seconds) || seconds <= 0) {
        return { ok: false, error: `--poll expects a positive number of seconds, got ${value ?? 'nothing'}` };
      }
      options.pollSeconds = seconds;
      i++;
    } else if (arg === '--root') {
      const value = argv[i + 1];
      if (!value) {
        return { ok: false, error: '--root expects a directory' };
      }
      options.rootDir = value;
      i++;
    } else {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  return { ok: true, options };
}
