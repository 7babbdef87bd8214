import { lookup } from 'dns/promises';
import { NetworkUnavailableError } from '../core/errors.js';
import { runCommand, type CommandOutcome, type CommandRunner } from './exec.js';

/**
 * `net session` only succeeds from an elevated prompt.
 */
export async function isElevated(run: CommandRunner = runCommand): Promise<boolean> {
  const outcome = await run('net', ['session'], { timeoutMs: 15_000 });
  return outcome.ok;
}

export type HostLookup = (host: string) => Promise<unknown>;

/**
 * Resolve `host` to decide whether downloads can work. Resolves when the
 * network looks usable; rejects with NetworkUnavailableError otherwise.
 */
export async function checkConnectivity(host: string, resolve: HostLookup = lookup): Promise<void> {
  try {
    await resolve(host);
  } catch (err) {
    throw new NetworkUnavailableError(host, { cause: err });
  }
}

export function restartComputer(delaySeconds = 10, run: CommandRunner = runCommand): Promise<CommandOutcome> {
  return run('shutdown.exe', ['/r', '/t', String(delaySeconds)], { timeoutMs: 15_000 });
}
