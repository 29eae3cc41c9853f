/**
 * Thin wrapper over execFile for the external command-line tools
 */

import { execFile } from 'child_process';

export interface CommandResult {
  /** Exit code; -1 when the process was killed by a signal. */
  code: number;
  stdout: string;
  stderr: string;
  /** The executable could not be found. */
  notFound: boolean;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type CommandRunner = (command: string, args: readonly string[], options?: RunOptions) => Promise<CommandResult>;

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Run a command to completion. Non-zero exits and a missing executable resolve;
 * any other spawn failure rejects.
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { cwd: options.cwd, timeout: options.timeoutMs ?? 0, maxBuffer: MAX_BUFFER, encoding: 'utf8', windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ code: 0, stdout, stderr, notFound: false });
          return;
        }
        // A number is the exit status; a string is a spawn errno
        const code: unknown = error.code;
        if (typeof code === 'number') {
          resolve({ code, stdout, stderr, notFound: false });
          return;
        }
        if (code === 'ENOENT') {
          resolve({ code: 127, stdout: '', stderr: error.message, notFound: true });
          return;
        }
        if (error.signal) {
          resolve({ code: -1, stdout, stderr: stderr || `Killed by ${error.signal}`, notFound: false });
          return;
        }
        reject(error);
      }
    );
  });
