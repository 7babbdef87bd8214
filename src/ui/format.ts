import chalk from 'chalk';

export const DIVIDER = '─'.repeat(40);

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function header(title: string): string {
  return `\n${chalk.bold.cyan(title)}\n${chalk.dim(DIVIDER)}`;
}

export function success(msg: string): string {
  return chalk.green(`✓ ${msg}`);
}

export function skipped(msg: string): string {
  return chalk.cyan(`↷ ${msg}`);
}

export function warn(msg: string): string {
  return chalk.yellow(`⚠ ${msg}`);
}

export function error(msg: string): string {
  return chalk.red(`✗ ${msg}`);
}

export function info(msg: string): string {
  return chalk.dim(`  ${msg}`);
}

/**
 * Print a debug line to stderr when --verbose is on.
 */
export function debug(msg: string): void {
  if (verbose) console.error(chalk.gray(`  · ${msg}`));
}

export function tableRow(label: string, value: string | number, pad = 20): string {
  return `  ${label.padEnd(pad)} ${value}`;
}

export function sectionTitle(title: string): string {
  return chalk.bold(`\n${title}`);
}

/**
 * 850 -> "850ms", 12_300 -> "12.3s", 125_000 -> "2m 5s".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds - minutes * 60);
  return `${minutes}m ${rest}s`;
}
