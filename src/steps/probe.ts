import { ProbeError } from '../core/errors.js';
import type { FeatureState } from '../tools/features.js';
import type { PackageState } from '../tools/winget.js';
import type { WslStatus } from '../tools/wsl.js';
import type { InstallationState, StepContext, StepDefinition } from './types.js';

export interface ProbeReading {
  state: InstallationState;
  error?: ProbeError;
}

export function presentIf(condition: boolean): InstallationState {
  return condition ? 'present' : 'absent';
}

export function fromFeatureState(state: FeatureState): InstallationState {
  if (state === 'enabled') return 'present';
  if (state === 'disabled') return 'absent';
  return 'unknown';
}

export function fromPackageState(state: PackageState): InstallationState {
  if (state === 'unknown') return 'unknown';
  return presentIf(state === 'installed');
}

export function fromWslStatus(status: WslStatus): InstallationState {
  if (status === 'unknown') return 'unknown';
  return presentIf(status === 'installed');
}

/**
 * Run a step's probe. Steps without a probe always read `absent`; a probe
 * that throws reads `unknown` and the error is handed back for display.
 */
export async function probeStep(step: StepDefinition, ctx: StepContext): Promise<ProbeReading> {
  if (!step.probe) return { state: 'absent' };
  try {
    return { state: await step.probe(ctx) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      state: 'unknown',
      error: new ProbeError(`Could not check "${step.label}": ${message}`, { cause: err }),
    };
  }
}
