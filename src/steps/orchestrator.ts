import { performance } from 'perf_hooks';
import { runStep, type RunStepHooks } from './runner.js';
import type { StepContext, StepDefinition, StepId, StepOutcome } from './types.js';

export type RunState =
  | { phase: 'idle' }
  | { phase: 'running'; step: StepId; index: number }
  | { phase: 'failed'; step: StepId; index: number }
  | { phase: 'done' };

export interface Transition {
  from: RunState;
  to: RunState;
  /** Milliseconds since the run started. */
  at: number;
}

export interface RunReport {
  outcomes: StepOutcome[];
  succeeded: StepId[];
  skipped: StepId[];
  failed: StepId[];
  /** Critical step whose failure stopped the run. */
  haltedBy?: StepId;
  /** The run was aborted at a step boundary. */
  cancelled: boolean;
  restartRequired: boolean;
  elapsedMs: number;
  transitions: Transition[];
}

export interface OrchestratorOptions {
  /** Checked between steps only; a running step is never interrupted. */
  signal?: AbortSignal;
  clock?: () => number;
  onStepStart?: (step: StepDefinition, index: number, total: number) => void;
  onStepEnd?: (outcome: StepOutcome) => void;
  onProbe?: RunStepHooks['onProbe'];
}

/**
 * Run steps strictly in sequence. Non-critical failures are recorded and the
 * run moves on; a critical failure stops it. Completed steps are never
 * rolled back.
 */
export async function runSteps(
  steps: readonly StepDefinition[],
  ctx: StepContext,
  options: OrchestratorOptions = {},
): Promise<RunReport> {
  const clock = options.clock ?? (() => performance.now());
  const startedAt = clock();
  const transitions: Transition[] = [];
  const outcomes: StepOutcome[] = [];
  let state: RunState = { phase: 'idle' };
  let cancelled = false;
  let haltedBy: StepId | undefined;

  const moveTo = (next: RunState): void => {
    transitions.push({ from: state, to: next, at: clock() - startedAt });
    state = next;
  };

  for (const [index, step] of steps.entries()) {
    if (options.signal?.aborted) {
      cancelled = true;
      break;
    }

    moveTo({ phase: 'running', step: step.id, index });
    options.onStepStart?.(step, index, steps.length);

    const stepStart = clock();
    const result = await runStep(step, ctx, { onProbe: options.onProbe });
    const durationMs = clock() - stepStart;

    const outcome: StepOutcome = result.ok
      ? {
          id: step.id,
          label: step.label,
          status: result.value.alreadySatisfied ? 'skipped' : 'succeeded',
          durationMs,
          note: result.value.note,
          restartRequired: result.value.restartRequired,
        }
      : { id: step.id, label: step.label, status: 'failed', durationMs, error: result.error };
    outcomes.push(outcome);
    options.onStepEnd?.(outcome);

    if (!result.ok && step.critical) {
      haltedBy = step.id;
      moveTo({ phase: 'failed', step: step.id, index });
      break;
    }
  }

  if (haltedBy === undefined) {
    moveTo({ phase: 'done' });
  }

  const idsWith = (status: StepOutcome['status']): StepId[] =>
    outcomes.filter((o) => o.status === status).map((o) => o.id);

  return {
    outcomes,
    succeeded: idsWith('succeeded'),
    skipped: idsWith('skipped'),
    failed: idsWith('failed'),
    haltedBy,
    cancelled,
    restartRequired: outcomes.some((o) => o.restartRequired === true),
    elapsedMs: clock() - startedAt,
    transitions,
  };
}
