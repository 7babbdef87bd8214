import { confirm } from '@inquirer/prompts';

/**
 * Ask whether to keep going after the connectivity check failed. Defaults
 * to stopping, since every install step downloads.
 */
export async function confirmOfflineRun(host: string): Promise<boolean> {
  return confirm({ message: `${host} is unreachable. Continue anyway? Downloads will likely fail`, default: false });
}

export async function confirmRestart(delaySeconds: number): Promise<boolean> {
  return confirm({ message: `Restart Windows now (in ${delaySeconds} seconds)?`, default: false });
}
