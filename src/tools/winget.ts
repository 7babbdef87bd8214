import { isInconclusive, runCommand, type CommandOutcome, type CommandRunner } from './exec.js';

/** APPINSTALLER_CLI_ERROR_UPDATE_NOT_APPLICABLE: the package is already installed. */
export const WINGET_ALREADY_INSTALLED = 0x8a15002b;

const AGREEMENT_FLAGS = ['--accept-source-agreements', '--disable-interactivity'];

export type PackageState = 'installed' | 'not-installed' | 'unknown';

export interface PackageInstallResult {
  outcome: CommandOutcome;
  ok: boolean;
  alreadyInstalled: boolean;
}

// Windows reports HRESULT exit codes as negative 32-bit integers.
function unsigned(code: number | null): number | null {
  return code === null ? null : code >>> 0;
}

/**
 * Ask winget whether the package is installed. A non-zero exit (no match)
 * means not installed; winget missing or timing out means unknown.
 */
export async function getPackageState(
  id: string,
  options: { timeoutMs?: number; run?: CommandRunner } = {},
): Promise<PackageState> {
  const run = options.run ?? runCommand;
  const outcome = await run('winget', ['list', '--id', id, '--exact', ...AGREEMENT_FLAGS], {
    timeoutMs: options.timeoutMs,
  });
  if (outcome.ok) return 'installed';
  return isInconclusive(outcome) ? 'unknown' : 'not-installed';
}

/**
 * Install a package silently, accepting package and source agreements.
 */
export async function installPackage(
  id: string,
  options: { timeoutMs?: number; run?: CommandRunner } = {},
): Promise<PackageInstallResult> {
  const run = options.run ?? runCommand;
  const outcome = await run(
    'winget',
    [
      'install', '--id', id, '--exact',
      '--silent',
      '--accept-package-agreements',
      ...AGREEMENT_FLAGS,
    ],
    { timeoutMs: options.timeoutMs },
  );
  const alreadyInstalled = unsigned(outcome.exitCode) === WINGET_ALREADY_INSTALLED;
  return { outcome, ok: outcome.ok || alreadyInstalled, alreadyInstalled };
}

/**
 * Check that winget itself is on PATH.
 */
export async function isWingetAvailable(run: CommandRunner = runCommand): Promise<boolean> {
  const outcome = await run('winget', ['--version'], { timeoutMs: 30_000 });
  return outcome.ok;
}
