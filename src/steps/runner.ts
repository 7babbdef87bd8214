import { StepExecutionError } from '../core/errors.js';
import { err, ok } from '../core/result.js';
import { probeStep } from './probe.js';
import type { InstallationState, StepContext, StepDefinition, StepResult } from './types.js';

export interface RunStepHooks {
  onProbe?: (step: StepDefinition, state: InstallationState, error?: Error) => void;
}

function toStepError(step: StepDefinition, cause: unknown): StepExecutionError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new StepExecutionError(step.id, message, step.critical, { cause });
}

/**
 * Run one step under the idempotence policy: a step whose probe reads
 * `present` succeeds as already satisfied without running its action.
 * `absent` and `unknown` both run the action. Never throws.
 */
export async function runStep(
  step: StepDefinition,
  ctx: StepContext,
  hooks: RunStepHooks = {},
): Promise<StepResult> {
  const reading = await probeStep(step, ctx);
  hooks.onProbe?.(step, reading.state, reading.error);
  if (reading.state === 'present') {
    return ok({ alreadySatisfied: true });
  }

  try {
    const result = await step.action(ctx);
    if (!result.ok) {
      return err(toStepError(step, result.error));
    }
    return ok({
      alreadySatisfied: false,
      note: result.value.note,
      restartRequired: result.value.restartRequired,
    });
  } catch (thrown) {
    return err(toStepError(step, thrown));
  }
}
