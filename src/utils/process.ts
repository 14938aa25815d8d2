import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface CommandInvocation {
  command: string;
  args: string[];
  cwd?: string;
}

/**
 * Runs an external program to completion and resolves to its standard output.
 * A non-zero exit rejects. Tests substitute an in-process implementation.
 */
export type CommandRunner = (invocation: CommandInvocation, signal?: AbortSignal) => Promise<string>;

export const runCommand: CommandRunner = async ({ command, args, cwd }, signal) => {
  logger.debug(`Running ${command} ${args.join(' ')}`, cwd ? { cwd } : undefined);
  const { stdout } = await execFileAsync(command, args, {
    cwd,
    signal,
    encoding: 'utf8',
    maxBuffer: 16 * 1024 * 1024
  });
  return stdout;
};

/** The program's stderr when it printed one, the error message otherwise. */
export function commandFailureMessage(error: unknown): string {
  if (error instanceof Error && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr) return stderr;
  }
  return error instanceof Error ? error.message : String(error);
}

export function isCommandMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
