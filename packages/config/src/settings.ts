/**
 * Typed ingest settings read from the environment
 */

import { z } from 'zod';
import { resolve } from 'path';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const booleanFlag = z.preprocess(
  blankToUndefined,
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default('false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
);

const optionalPath = z.preprocess(blankToUndefined, z.string().trim().optional());

// Env values are strings; coerce and bound them here
const SettingsSchema = z.object({
  INGEST_ROOT: optionalPath,
  INGEST_POLL_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(5)),
  INGEST_QUIESCE_INTERVAL_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(300)),
  INGEST_QUIESCE_ATTEMPTS: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(10)),
  INGEST_GUARD_STALE_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(21600)),
  INGEST_WATCH_POLLING: booleanFlag,
  INGEST_WATCH_DEBOUNCE_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(500)),
  MUTOOL_PATH: optionalPath,
  PDFSIG_PATH: optionalPath,
  EXIFTOOL_PATH: optionalPath,
  OTFINFO_PATH: optionalPath,
  FC_SCAN_PATH: optionalPath,
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
  LOG_PRETTY: booleanFlag,
});

export const SETTINGS_ENV_KEYS = SettingsSchema.keyof().options;

export interface ToolCommands {
  mutool: string;
  pdfsig: string;
  exiftool: string;
  otfinfo: string;
  fcScan: string;
}

export interface IngestSettings {
  rootDir: string;
  pollSeconds: number;
  quiescenceIntervalMs: number;
  quiescenceAttempts: number;
  guardStaleSeconds: number;
  watchPolling: boolean;
  watchDebounceMs: number;
  tools: ToolCommands;
  logLevel: string;
  logPretty: boolean;
}

/**
 * Parse ingest settings; throws listing every invalid key
 */
export function loadIngestSettings(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): IngestSettings {
  const result = SettingsSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid ingest settings:\n  ${problems.join('\n  ')}`);
  }

  const parsed = result.data;
  return {
    rootDir: resolve(cwd, parsed.INGEST_ROOT ?? '.'),
    pollSeconds: parsed.INGEST_POLL_SECONDS,
    quiescenceIntervalMs: parsed.INGEST_QUIESCE_INTERVAL_MS,
    quiescenceAttempts: parsed.INGEST_QUIESCE_ATTEMPTS,
    guardStaleSeconds: parsed.INGEST_GUARD_STALE_SECONDS,
    watchPolling: parsed.INGEST_WATCH_POLLING,
    watchDebounceMs: parsed.INGEST_WATCH_DEBOUNCE_MS,
    tools: {
      mutool: parsed.MUTOOL_PATH ?? 'mutool',
      pdfsig: parsed.PDFSIG_PATH ?? 'pdfsig',
      exiftool: parsed.EXIFTOOL_PATH ?? 'exiftool',
      otfinfo: parsed.OTFINFO_PATH ?? 'otfinfo',
      fcScan: parsed.FC_SCAN_PATH ?? 'fc-scan',
    },
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
  };
}
