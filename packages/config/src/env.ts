/**
 * Centralized environment variable loader
 *
 * Locates repo root and loads .env file deterministically.
 * Provides diagnostics without mutating values that are already set.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  value?: string;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: EnvKeyStatus[];
  warnings: string[];
}

export interface InitEnvResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>; // key -> '.env' | '.env.local'
}

/**
 * Find repository root by walking up from current directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        if (typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg) {
          return current;
        }
      } catch {
        // Unreadable package.json: keep walking
      }
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

/**
 * Check if value contains unprintable characters (common Windows CRLF issues)
 */
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

let cachedResult: InitEnvResult | null = null;

function loadFile(path: string, source: string, keysLoaded: string[], keySources: Record<string, string>): boolean {
  const result = config({ path, override: true });
  const hasParsedValues = !!(result.parsed && Object.keys(result.parsed).length > 0);
  const loaded = !result.error || hasParsedValues;

  if (result.parsed) {
    for (const [key, value] of Object.entries(result.parsed)) {
      if (value.trim().length > 0) {
        keySources[key] = source;
        if (!keysLoaded.includes(key)) {
          keysLoaded.push(key);
        }
      }
    }
  }

  if (!loaded && result.error) {
    console.warn(`[env] Warning: Error loading ${source} file: ${result.error.message}`);
  }
  return loaded;
}

/**
 * Initialize environment variables
 * Must be called before settings are read from process.env
 *
 * Loads from:
 * 1. $ENV_FILE, or else <repo-root>/.env (if exists)
 * 2. <repo-root>/.env.local (if exists, overrides .env)
 *
 * An existing non-empty variable is never replaced by an empty value from a file.
 */
export function initEnv(): InitEnvResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  // The .env file is optional here: every setting has a default
  const loaded = existsSync(envFilePath) ? loadFile(envFilePath, '.env', keysLoaded, keySources) : false;
  const localLoaded = existsSync(envLocalFilePath)
    ? loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources)
    : false;

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };

  return cachedResult;
}

/**
 * Get environment diagnostics for the given keys
 */
export function getEnvDiagnostics(keys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources ?? {};

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath} (defaults apply)`);
  }

  const statuses = keys.map((key): EnvKeyStatus => {
    const value = process.env[key];
    if (!value || value.trim().length === 0) {
      return { key, present: false };
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
    return { key, present: true, value: value.trim(), source: keySources[key] };
  });

  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists,
    keys: statuses,
    warnings,
  };
}
