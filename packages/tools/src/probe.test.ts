import { describe, it, expect, vi } from 'vitest';
import { missingMandatoryTools, probeTools } from './probe.js';
import type { CommandRunner } from './run.js';

const TOOLS = { mutool: 'mutool', pdfsig: 'pdfsig', exiftool: 'exiftool', otfinfo: 'otfinfo', fcScan: 'fc-scan' };

function runnerWith(installed: string[]): CommandRunner {
  return vi.fn(async (command: string) => ({
    code: installed.includes(command) ? 1 : 127,
    stdout: '',
    stderr: '',
    notFound: !installed.includes(command),
  }));
}

describe('probeTools', () => {
  it('treats any exit status as available', async () => {
    const availability = await probeTools(TOOLS, runnerWith(['mutool', 'exiftool']));

    expect(availability).toEqual({ mutool: true, pdfsig: false, exiftool: true, otfinfo: false, fcScan: false });
    expect(missingMandatoryTools(availability)).toEqual([]);
  });

  it('passes each tool its version flag', async () => {
    const run = runnerWith([]);
    await probeTools({ ...TOOLS, mutool: '/opt/mupdf/bin/mutool' }, run);

    expect(run).toHaveBeenCalledWith('/opt/mupdf/bin/mutool', ['-v'], { timeoutMs: 10000 });
    expect(run).toHaveBeenCalledWith('exiftool', ['-ver'], { timeoutMs: 10000 });
    expect(run).toHaveBeenCalledWith('fc-scan', ['--version'], { timeoutMs: 10000 });
  });

  it('flags a missing extractor', async () => {
    const availability = await probeTools(TOOLS, runnerWith(['pdfsig']));

    expect(missingMandatoryTools(availability)).toEqual(['mutool']);
  });
});
