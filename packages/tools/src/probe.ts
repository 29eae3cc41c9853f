/**
 * Startup probing of the external tools, and the once-per-tool warning
 */

import pino from 'pino';
import type { ToolCommands } from '@objledger/config';
import { runCommand, type CommandRunner } from './run.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'tools.probe' });

export type ToolName = keyof ToolCommands;

export type ToolAvailability = Record<ToolName, boolean>;

export const TOOL_NAMES: readonly ToolName[] = ['mutool', 'pdfsig', 'exiftool', 'otfinfo', 'fcScan'];

export const MANDATORY_TOOLS: readonly ToolName[] = ['mutool'];

const PROBE_ARGS: Record<ToolName, readonly string[]> = {
  mutool: ['-v'],
  pdfsig: ['-v'],
  exiftool: ['-ver'],
  otfinfo: ['--version'],
  fcScan: ['--version'],
};

const TOOL_PURPOSE: Record<ToolName, string> = {
  mutool: 'object extraction',
  pdfsig: 'signature fields',
  exiftool: 'Author/Creator',
  otfinfo: 'font names',
  fcScan: 'font names (fallback)',
};

const warned = new Set<string>();

/**
 * Log that a tool is unavailable, once per command per process
 */
export function reportUnavailable(command: string, purpose?: string): void {
  if (warned.has(command)) return;
  warned.add(command);
  logger.warn(
    { event: 'tools.unavailable', tool: command, purpose },
    `${command} not found; ${purpose ?? 'its fields'} will be left blank`
  );
}

/**
 * Only a spawn failure counts as unavailable; exit codes of the version flags vary
 */
export async function probeTools(tools: ToolCommands, run: CommandRunner = runCommand): Promise<ToolAvailability> {
  const check = async (name: ToolName): Promise<boolean> =>
    !(await run(tools[name], PROBE_ARGS[name], { timeoutMs: 10000 })).notFound;

  const [mutool, pdfsig, exiftool, otfinfo, fcScan] = await Promise.all([
    check('mutool'),
    check('pdfsig'),
    check('exiftool'),
    check('otfinfo'),
    check('fcScan'),
  ]);
  const availability: ToolAvailability = { mutool, pdfsig, exiftool, otfinfo, fcScan };

  for (const name of TOOL_NAMES) {
    if (!availability[name] && !MANDATORY_TOOLS.includes(name)) {
      reportUnavailable(tools[name], TOOL_PURPOSE[name]);
    }
  }
  logger.debug({ event: 'tools.probed', availability }, 'Probed external tools');
  return availability;
}

export function missingMandatoryTools(availability: ToolAvailability): ToolName[] {
  return MANDATORY_TOOLS.filter((name) => !availability[name]);
}
