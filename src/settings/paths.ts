import { existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';

const STABLE_PACKAGE = 'Microsoft.WindowsTerminal_8wekyb3d8bbwe';
const PREVIEW_PACKAGE = 'Microsoft.WindowsTerminalPreview_8wekyb3d8bbwe';

export interface SettingsPathOptions {
  override?: string;
  env?: NodeJS.ProcessEnv;
  exists?: (path: string) => boolean;
}

function localAppData(env: NodeJS.ProcessEnv): string {
  return env.LOCALAPPDATA || join(homedir(), 'AppData', 'Local');
}

/**
 * Known settings.json locations, in lookup order: the Store package, the
 * Preview package, then an unpackaged install.
 */
export function settingsCandidates(env: NodeJS.ProcessEnv = process.env): string[] {
  const base = localAppData(env);
  return [
    join(base, 'Packages', STABLE_PACKAGE, 'LocalState', 'settings.json'),
    join(base, 'Packages', PREVIEW_PACKAGE, 'LocalState', 'settings.json'),
    join(base, 'Microsoft', 'Windows Terminal', 'settings.json'),
  ];
}

/**
 * Resolve the terminal settings file. An explicit override always wins;
 * otherwise the first existing candidate, falling back to the Store
 * package location when none exists yet.
 */
export function resolveSettingsPath(options: SettingsPathOptions = {}): string {
  if (options.override) return options.override;
  const exists = options.exists ?? existsSync;
  const candidates = settingsCandidates(options.env ?? process.env);
  return candidates.find((candidate) => exists(candidate)) ?? candidates[0];
}
