import { describe, it, expect } from 'vitest';
import { runCommand } from './run.js';

describe('runCommand', () => {
  it('reports a missing executable without throwing', async () => {
    const result = await runCommand('objledger-no-such-tool', ['-v']);

    expect(result.notFound).toBe(true);
    expect(result.code).toBe(127);
  });

  it('captures output and a non-zero exit status', async () => {
    const result = await runCommand(process.execPath, [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
    ]);

    expect(result).toEqual({ code: 3, stdout: 'out', stderr: 'err', notFound: false });
  });
});
