import { getConfigPath, loadConfig } from '../core/config.js';
import { resolveSettingsPath } from '../settings/paths.js';
import { runCommand, type CommandRunner } from '../tools/exec.js';
import type { StepContext } from '../steps/types.js';
import { debug } from '../ui/format.js';

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

/**
 * Command runner that echoes each command line and its exit status in
 * verbose mode.
 */
export const tracedRun: CommandRunner = async (file, args, options) => {
  debug(`$ ${[file, ...args].join(' ')}`);
  const outcome = await runCommand(file, args, options);
  debug(`  exit ${outcome.exitCode ?? '-'}${outcome.timedOut ? ' (timed out)' : ''}`);
  return outcome;
};

/**
 * Load configuration and build the context every step runs with.
 * Throws ConfigValidationError for an invalid config file.
 */
export function createStepContext(options: GlobalOptions = {}, settingsOverride?: string): StepContext {
  const explicit = options.config ?? process.env.DEVBOX_SETUP_CONFIG;
  const configPath = explicit || getConfigPath();
  const config = loadConfig(configPath, { required: Boolean(explicit) });
  const settingsPath = resolveSettingsPath({ override: settingsOverride ?? config.settingsPath });
  debug(`config: ${configPath}`);
  debug(`terminal settings: ${settingsPath}`);
  return {
    config,
    run: tracedRun,
    settingsPath,
    platform: process.platform,
  };
}
