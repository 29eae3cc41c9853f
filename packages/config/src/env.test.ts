import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { initEnv } from './env.js';

describe('initEnv', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'objledger-env-'));
  });

  afterEach(async () => {
    delete process.env.ENV_FILE;
    delete process.env.OBJLEDGER_ENV_TEST_KEY;
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the file named by ENV_FILE once', async () => {
    const envFile = join(dir, 'ingest.env');
    await writeFile(envFile, 'OBJLEDGER_ENV_TEST_KEY=from-file\n');
    process.env.ENV_FILE = envFile;

    const result = initEnv();

    expect(result.envFilePath).toBe(envFile);
    expect(result.loaded).toBe(true);
    expect(result.keysLoaded).toContain('OBJLEDGER_ENV_TEST_KEY');
    expect(result.keySources.OBJLEDGER_ENV_TEST_KEY).toBe('.env');
    expect(process.env.OBJLEDGER_ENV_TEST_KEY).toBe('from-file');
    expect(initEnv()).toBe(result);
  });
});
