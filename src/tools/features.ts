import { runCommand, type CommandOutcome, type CommandRunner } from './exec.js';

export type FeatureState = 'enabled' | 'disabled' | 'unknown';

/** DISM exit code for "succeeded, restart required". */
export const DISM_RESTART_REQUIRED = 3010;

export const WSL_FEATURE = 'Microsoft-Windows-Subsystem-Linux';
export const VM_PLATFORM_FEATURE = 'VirtualMachinePlatform';

export interface FeatureOptions {
  timeoutMs?: number;
  run?: CommandRunner;
}

export interface FeatureChange {
  outcome: CommandOutcome;
  ok: boolean;
  restartRequired: boolean;
}

/**
 * Classify the `State : ...` line of `dism /Get-FeatureInfo`.
 * A pending enable counts as enabled; it only needs the restart.
 */
export function parseFeatureState(output: string): FeatureState {
  const match = output.match(/^\s*State\s*:\s*(.+?)\s*$/im);
  if (!match) return 'unknown';
  const state = match[1].toLowerCase();
  if (state === 'enabled' || state === 'enable pending') return 'enabled';
  if (state === 'disabled' || state === 'disable pending' || state.startsWith('disabled with payload')) {
    return 'disabled';
  }
  return 'unknown';
}

export async function getFeatureState(name: string, options: FeatureOptions = {}): Promise<FeatureState> {
  const run = options.run ?? runCommand;
  const outcome = await run(
    'dism.exe',
    ['/online', '/English', '/Get-FeatureInfo', `/FeatureName:${name}`],
    { timeoutMs: options.timeoutMs },
  );
  if (!outcome.ok) return 'unknown';
  return parseFeatureState(outcome.stdout);
}

/**
 * Enable (with all parent features) or disable an optional feature without
 * restarting. Exit code 3010 is a success that needs a restart.
 */
export async function setFeatureState(
  name: string,
  enabled: boolean,
  options: FeatureOptions = {},
): Promise<FeatureChange> {
  const run = options.run ?? runCommand;
  const args = enabled
    ? ['/online', '/Enable-Feature', `/FeatureName:${name}`, '/All', '/NoRestart']
    : ['/online', '/Disable-Feature', `/FeatureName:${name}`, '/NoRestart'];
  const outcome = await run('dism.exe', args, { timeoutMs: options.timeoutMs });
  const restartRequired = outcome.exitCode === DISM_RESTART_REQUIRED;
  return { outcome, ok: outcome.ok || restartRequired, restartRequired };
}
