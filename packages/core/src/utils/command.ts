/**
 * Thin wrapper over execFile so platform probes can be driven by canned
 * output in tests.
 */

import { execFile, execFileSync } from 'node:child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  opts?: { timeoutMs?: number }
) => Promise<CommandResult>;

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export const runCommand: CommandRunner = (file, args, opts = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'utf8', timeout: opts.timeoutMs ?? 10_000, maxBuffer: 16 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (err) {
          const exitCode = typeof err.code === 'number' ? err.code : null;
          reject(new CommandError(`${file} failed: ${err.message}`, exitCode, stdout, stderr));
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });

/**
 * Check if a command is available on the system
 */
export function isCommandAvailable(cmd: string): boolean {
  const locator = process.platform === 'win32' ? 'where' : 'which';
  try {
    execFileSync(locator, [cmd], { encoding: 'utf-8', stdio: 'pipe' });
    return true;
  } catch {
    return false;
  }
}
