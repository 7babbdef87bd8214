import { execa } from 'execa';

export interface RunOptions {
  timeoutMs?: number;
  /** wsl.exe writes UTF-16LE to pipes. */
  encoding?: 'utf8' | 'utf16le';
}

export interface CommandOutcome {
  command: string;
  ok: boolean;
  /** Null when the process never started or was killed. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Empty when the command succeeded. */
  message: string;
}

/**
 * Runs one external command to completion. Resolves for every exit status;
 * callers decide what a non-zero code means.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: RunOptions,
) => Promise<CommandOutcome>;

function text(value: unknown): string {
  return typeof value === 'string' ? value.replace(/\u0000/g, '').replace(/\r\n/g, '\n').trim() : '';
}

/**
 * Human-readable reason for a failed outcome, preferring the tool's own
 * stderr (first line) over the spawn message.
 */
export function failureReason(outcome: CommandOutcome): string {
  if (outcome.timedOut) return outcome.message;
  const firstLine = (outcome.stderr || outcome.stdout).split('\n')[0]?.trim();
  if (firstLine) {
    return outcome.exitCode !== null ? `${firstLine} (exit code ${outcome.exitCode})` : firstLine;
  }
  return outcome.message || `${outcome.command} failed`;
}

/**
 * The command never reached an exit code of its own: it could not be
 * started, was killed or timed out. Such an outcome says nothing about the
 * state the command was asked about.
 */
export function isInconclusive(outcome: CommandOutcome): boolean {
  return outcome.exitCode === null || outcome.timedOut;
}

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const command = [file, ...args].join(' ');
  const result = await execa(file, [...args], {
    reject: false,
    stdin: 'ignore',
    windowsHide: true,
    timeout: options.timeoutMs,
    encoding: options.encoding ?? 'utf8',
  });

  const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
  let message = '';
  if (result.timedOut && options.timeoutMs !== undefined) {
    message = `${command} timed out after ${Math.round(options.timeoutMs / 1000)}s`;
  } else if (result.failed) {
    message = 'shortMessage' in result && typeof result.shortMessage === 'string'
      ? result.shortMessage
      : `${command} failed`;
  }

  return {
    command,
    ok: !result.failed,
    exitCode,
    stdout: text(result.stdout),
    stderr: text(result.stderr),
    timedOut: result.timedOut,
    message,
  };
};
