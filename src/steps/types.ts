import type { InstallerConfig } from '../core/config.js';
import type { StepExecutionError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import type { CommandRunner } from '../tools/exec.js';
import type { HostLookup } from '../tools/system.js';

/** Every step, in the order "install everything" runs them. */
export const STEP_ORDER = [
  'verify-prerequisites',
  'enable-wsl-feature',
  'enable-vm-platform',
  'install-wsl',
  'set-wsl-version',
  'install-distribution',
  'set-default-distribution',
  'install-terminal',
  'install-packages',
  'apply-color-scheme',
] as const;

export type StepId = (typeof STEP_ORDER)[number];

export function isStepId(value: string): value is StepId {
  return STEP_ORDER.some((id) => id === value);
}

export type InstallationState = 'present' | 'absent' | 'unknown';

export interface StepContext {
  config: Readonly<InstallerConfig>;
  run: CommandRunner;
  settingsPath: string;
  platform: NodeJS.Platform;
  lookup?: HostLookup;
  now?: () => Date;
}

export interface StepSuccess {
  /** The probe reported `present`; nothing was run. */
  alreadySatisfied: boolean;
  note?: string;
  restartRequired?: boolean;
}

/** What an action reports back when it did its work. */
export interface ActionReport {
  note?: string;
  restartRequired?: boolean;
}

export interface StepDefinition {
  id: StepId;
  label: string;
  /** Failure halts the run and the process exits non-zero. */
  critical: boolean;
  probe?: (ctx: StepContext) => Promise<InstallationState>;
  action: (ctx: StepContext) => Promise<Result<ActionReport, Error>>;
}

export type StepResult = Result<StepSuccess, StepExecutionError>;

export type StepStatus = 'succeeded' | 'skipped' | 'failed';

export interface StepOutcome {
  id: StepId;
  label: string;
  status: StepStatus;
  durationMs: number;
  note?: string;
  restartRequired?: boolean;
  error?: StepExecutionError;
}
