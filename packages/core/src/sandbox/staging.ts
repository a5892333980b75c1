/**
 * Target staging and launch preflight shared by the backends.
 */

import { constants } from 'node:fs';
import { access, chmod, copyFile, open } from 'node:fs/promises';
import * as path from 'node:path';
import { toErrorMessage } from '../utils/errors.js';
import { LaunchFailedError } from './errors.js';

/** Copy the target into `dir` and mark it executable. Returns the staged path. */
export async function stageTarget(targetFilePath: string, dir: string): Promise<string> {
  const staged = path.join(dir, path.basename(targetFilePath));
  try {
    await copyFile(targetFilePath, staged);
    await chmod(staged, 0o755);
  } catch (err) {
    throw new LaunchFailedError(targetFilePath, `staging failed: ${toErrorMessage(err)}`, err);
  }
  return staged;
}

/** Interpreter and arguments named by a leading `#!` line, or null. */
export function parseShebang(head: string): string[] | null {
  if (!head.startsWith('#!')) return null;
  const line = head.slice(2).split(/\r?\n/, 1)[0] ?? '';
  const words = line.trim().split(/\s+/).filter(Boolean);
  return words.length > 0 ? words : null;
}

export async function readFirstLine(filePath: string): Promise<string> {
  const file = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(256);
    const { bytesRead } = await file.read(buffer, 0, buffer.length, 0);
    return buffer.subarray(0, bytesRead).toString('utf8').split('\n', 1)[0] ?? '';
  } finally {
    await file.close();
  }
}

/**
 * Exit codes a shell or exec wrapper uses when the program itself never ran:
 * 126 found but not executable, 127 not found.
 */
const EXEC_FAILURES: Readonly<Record<number, string>> = {
  126: 'target could not be executed',
  127: 'interpreter or executable not found',
};

export function execFailure(exitCode: number | null): string | null {
  return exitCode === null ? null : (EXEC_FAILURES[exitCode] ?? null);
}

export interface PreflightOptions {
  commandAvailable: (cmd: string) => boolean;
}

/**
 * Check that `command` can start: an interpreter chosen by extension must be on
 * PATH, and a directly executed script's `#!` interpreter must exist.
 * Throws LaunchFailedError.
 */
export async function preflightCommand(
  targetFilePath: string,
  command: readonly string[],
  staged: string,
  opts: PreflightOptions
): Promise<void> {
  const [program] = command;
  if (program === undefined) throw new LaunchFailedError(targetFilePath, 'empty command');

  if (program !== staged) {
    if (!opts.commandAvailable(program)) {
      throw new LaunchFailedError(targetFilePath, `interpreter not found: ${program}`);
    }
    return;
  }

  let shebang: string[] | null;
  try {
    shebang = parseShebang(await readFirstLine(staged));
  } catch (err) {
    throw new LaunchFailedError(targetFilePath, `target is not readable: ${toErrorMessage(err)}`, err);
  }
  if (!shebang) return;

  const [interpreter, firstArg] = shebang;
  if (interpreter === undefined) return;
  if (path.posix.basename(interpreter) === 'env' && firstArg !== undefined && !firstArg.startsWith('-')) {
    if (!opts.commandAvailable(firstArg)) {
      throw new LaunchFailedError(targetFilePath, `interpreter not found: ${firstArg}`);
    }
    return;
  }

  try {
    await access(interpreter, constants.X_OK);
  } catch (err) {
    throw new LaunchFailedError(targetFilePath, `interpreter not found: ${interpreter}`, err);
  }
}
