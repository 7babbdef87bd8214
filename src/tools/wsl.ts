import { isInconclusive, runCommand, type CommandOutcome, type CommandRunner, type RunOptions } from './exec.js';

export type WslStatus = 'installed' | 'not-installed' | 'unknown';

export interface Distribution {
  name: string;
  state: string;
  version: number | null;
  isDefault: boolean;
}

export interface WslOptions {
  timeoutMs?: number;
  run?: CommandRunner;
}

const WSL = 'wsl.exe';

function wsl(args: string[], options: WslOptions): Promise<CommandOutcome> {
  const run = options.run ?? runCommand;
  const runOptions: RunOptions = { timeoutMs: options.timeoutMs, encoding: 'utf16le' };
  return run(WSL, args, runOptions);
}

/**
 * Parse `wsl --list --verbose` output:
 *
 *     NAME            STATE           VERSION
 *   * Ubuntu-22.04    Stopped         2
 *     docker-desktop  Running         2
 */
export function parseDistributionList(output: string): Distribution[] {
  const distributions: Distribution[] = [];
  // The header row is translated on localized Windows; skip it by position.
  const rows = output.split('\n').map((line) => line.trim()).filter(Boolean).slice(1);
  for (const line of rows) {
    const isDefault = line.startsWith('*');
    const columns = line.replace(/^\*\s*/, '').split(/\s+/);
    if (columns.length < 3) continue;
    const version = Number.parseInt(columns[2], 10);
    distributions.push({
      name: columns[0],
      state: columns[1],
      version: Number.isNaN(version) ? null : version,
      isDefault,
    });
  }
  return distributions;
}

/**
 * Read the default WSL version from `wsl --status`, or null when the line
 * is missing. Only English output carries the label; `wsl --status` has no
 * switch for it, so localized systems read null.
 */
export function parseDefaultVersion(statusOutput: string): number | null {
  const match = statusOutput.match(/Default Version:\s*(\d+)/i);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * `wsl --status` exits non-zero until the platform is installed. A wsl.exe
 * that cannot be started or does not answer in time reads as unknown.
 */
export async function getWslStatus(options: WslOptions = {}): Promise<WslStatus> {
  const outcome = await wsl(['--status'], options);
  if (outcome.ok) return 'installed';
  return isInconclusive(outcome) ? 'unknown' : 'not-installed';
}

export async function getDefaultVersion(options: WslOptions = {}): Promise<number | null> {
  const outcome = await wsl(['--status'], options);
  if (!outcome.ok) return null;
  return parseDefaultVersion(outcome.stdout);
}

/**
 * Install the WSL platform. Extra flags are passed through after
 * `--install --no-distribution`.
 */
export function installWsl(flags: string[] = [], options: WslOptions = {}): Promise<CommandOutcome> {
  return wsl(['--install', '--no-distribution', ...flags], options);
}

/**
 * List installed distributions. With none installed, wsl.exe exits
 * non-zero; that is reported as an empty list. Null when wsl.exe could not
 * be run at all.
 */
export async function listDistributions(options: WslOptions = {}): Promise<Distribution[] | null> {
  const outcome = await wsl(['--list', '--verbose'], options);
  if (isInconclusive(outcome)) return null;
  if (!outcome.ok) return [];
  return parseDistributionList(outcome.stdout);
}

export function setDefaultVersion(version: number, options: WslOptions = {}): Promise<CommandOutcome> {
  return wsl(['--set-default-version', String(version)], options);
}

export function installDistribution(name: string, options: WslOptions = {}): Promise<CommandOutcome> {
  return wsl(['--install', '--distribution', name, '--no-launch'], options);
}

export function setDefaultDistribution(name: string, options: WslOptions = {}): Promise<CommandOutcome> {
  return wsl(['--set-default', name], options);
}
