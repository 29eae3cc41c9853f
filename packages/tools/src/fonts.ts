import type { FontNameProvider } from '@objledger/core';
import { reportUnavailable } from './probe.js';
import { runCommand, type CommandRunner } from './run.js';

const FULL_NAME = /^Full name:\s*(.*)$/;

/**
 * "Full name:" value from `otfinfo -i`
 */
export function parseOtfinfoFullName(stdout: string): string {
  for (const line of stdout.split(/\r?\n/)) {
    const match = FULL_NAME.exec(line);
    if (match) return match[1].trim();
  }
  return '';
}

/**
 * First family printed by `fc-scan --format '%{family}\n'`
 */
export function parseFcScanFamily(stdout: string): string {
  const first = stdout.split(/\r?\n/).find((line) => line.trim().length > 0);
  return first?.trim() ?? '';
}

export interface FontToolCommands {
  otfinfo: string;
  fcScan: string;
}

/**
 * Display name of an embedded font: otfinfo first, fc-scan as the fallback,
 * blank when neither knows it
 */
export class FontNameLookup implements FontNameProvider {
  constructor(
    private readonly commands: FontToolCommands = { otfinfo: 'otfinfo', fcScan: 'fc-scan' },
    private readonly run: CommandRunner = runCommand
  ) {}

  async getFontName(fontPath: string): Promise<string> {
    const otfinfo = await this.run(this.commands.otfinfo, ['-i', fontPath]);
    if (otfinfo.notFound) {
      reportUnavailable(this.commands.otfinfo, 'font names');
    } else if (otfinfo.code === 0) {
      const name = parseOtfinfoFullName(otfinfo.stdout);
      if (name) return name;
    }

    const fcScan = await this.run(this.commands.fcScan, ['--format', '%{family}\n', fontPath]);
    if (fcScan.notFound) {
      reportUnavailable(this.commands.fcScan, 'font names (fallback)');
      return '';
    }
    return fcScan.code === 0 ? parseFcScanFamily(fcScan.stdout) : '';
  }
}
