/**
 * Command Runner - external program execution for adapters.
 *
 * Uses child_process.execFile (no shell), so configured argv entries are
 * passed through verbatim.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  /** Kill the process after this many ms */
  timeoutMs: number;
  /** Abort the process early */
  signal?: AbortSignal | undefined;
}

export type CommandErrorCode =
  | 'timeout'
  | 'not_found'
  | 'permission_denied'
  | 'exit_code'
  | 'aborted';

export type CommandResult =
  | { ok: true; stdout: string; stderr: string }
  | { ok: false; errorCode: CommandErrorCode; retryable: boolean; message: string };

/**
 * Runs one command. Never rejects; failures come back as values.
 */
export type CommandRunner = (
  argv: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (argv, options) => {
  const [cmd, ...args] = argv;
  if (!cmd) {
    return { ok: false, errorCode: 'not_found', retryable: false, message: 'Empty command' };
  }

  try {
    const { stdout, stderr } = await execFileAsync(cmd, args, {
      timeout: options.timeoutMs,
      ...(options.signal && { signal: options.signal }),
      encoding: 'utf8',
    });
    return { ok: true, stdout, stderr };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const err = error as NodeJS.ErrnoException & { killed?: boolean };

    if (err.name === 'AbortError') {
      return { ok: false, errorCode: 'aborted', retryable: true, message };
    }
    if (err.killed === true || err.code === 'ETIMEDOUT') {
      return { ok: false, errorCode: 'timeout', retryable: true, message };
    }
    if (err.code === 'ENOENT') {
      return { ok: false, errorCode: 'not_found', retryable: false, message };
    }
    if (err.code === 'EACCES') {
      return { ok: false, errorCode: 'permission_denied', retryable: false, message };
    }
    // Non-zero exit: usually network or remote trouble, worth another try
    return { ok: false, errorCode: 'exit_code', retryable: true, message };
  }
};

/**
 * Substitute `{name}` placeholders in an argv template.
 */
export function expandArgv(template: readonly string[], values: Record<string, string>): string[] {
  return template.map((part) =>
    part.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match)
  );
}
