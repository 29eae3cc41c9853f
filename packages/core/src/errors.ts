/**
 * Error taxonomy for the ingest pipeline
 *
 * Document-scoped kinds are caught at the coordinator boundary; the table-level
 * kinds stop the invocation.
 */

export type IngestErrorKind =
  | 'TransientIO'
  | 'ToolUnavailable'
  | 'ExtractionFailure'
  | 'SchemaMismatch'
  | 'LedgerCorruption';

export class IngestError extends Error {
  readonly kind: IngestErrorKind;
  readonly context: Record<string, unknown>;

  constructor(kind: IngestErrorKind, message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = `${kind}Error`;
    this.kind = kind;
    this.context = options.context ?? {};
  }
}

export class TransientIOError extends IngestError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('TransientIO', message, options);
  }
}

export class ToolUnavailableError extends IngestError {
  readonly tool: string;

  constructor(tool: string, options: { cause?: unknown } = {}) {
    super('ToolUnavailable', `External tool not available: ${tool}`, { ...options, context: { tool } });
    this.tool = tool;
  }
}

export class ExtractionFailureError extends IngestError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('ExtractionFailure', message, options);
  }
}

export class SchemaMismatchError extends IngestError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('SchemaMismatch', message, options);
  }
}

export class LedgerCorruptionError extends IngestError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('LedgerCorruption', message, options);
  }
}

export function isIngestError(err: unknown): err is IngestError {
  return err instanceof IngestError;
}

/**
 * Whether an error must stop the whole invocation rather than one document
 */
export function isFatal(err: unknown): boolean {
  if (!isIngestError(err)) return true;
  return err.kind === 'SchemaMismatch' || err.kind === 'LedgerCorruption';
}

/**
 * Error message safe for logs: secrets masked, length capped
 */
export function safeErrorMessage(err: unknown): string {
  let msg = err instanceof Error ? err.message : String(err);
  msg = msg.replace(/token[=:]\s*[\w-]+/gi, 'token=***');
  msg = msg.replace(/password[=:]\s*[^\s]+/gi, 'password=***');
  if (msg.length > 500) {
    msg = msg.substring(0, 500) + '...';
  }
  return msg;
}
