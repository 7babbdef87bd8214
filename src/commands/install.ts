import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { describeError, NetworkUnavailableError } from '../core/errors.js';
import { runSteps, type RunReport } from '../steps/orchestrator.js';
import { selectSteps } from '../steps/registry.js';
import type { StepContext, StepDefinition, StepId } from '../steps/types.js';
import { checkConnectivity, restartComputer } from '../tools/system.js';
import { failureReason } from '../tools/exec.js';
import { debug, error, formatDuration, header, info, skipped, success, warn } from '../ui/format.js';
import { confirmOfflineRun, confirmRestart } from '../ui/prompts.js';
import { printReport } from '../ui/report.js';

export interface InstallOptions {
  yes?: boolean;
  /** Skip the network check. */
  offline?: boolean;
}

/**
 * Check the network before downloading anything. Without it the user may
 * still choose to continue. Returns false when the run should stop.
 */
async function ensureNetwork(ctx: StepContext, options: InstallOptions): Promise<boolean> {
  if (options.offline) return true;

  const spinner = ora('Checking network...').start();
  try {
    await checkConnectivity(ctx.config.connectivityHost, ctx.lookup);
    spinner.succeed(chalk.green('Network available'));
    return true;
  } catch (err) {
    if (!(err instanceof NetworkUnavailableError)) {
      spinner.fail(chalk.red('Network check failed'));
      throw err;
    }
    spinner.warn(chalk.yellow(err.message));
  }

  if (options.yes) {
    console.log(warn('Continuing without network (--yes)'));
    return true;
  }
  return confirmOfflineRun(ctx.config.connectivityHost);
}

const RESTART_DELAY_SECONDS = 10;

async function offerRestart(options: InstallOptions, ctx: StepContext): Promise<void> {
  console.log('');
  console.log(warn('A restart is required to finish enabling Windows features.'));
  if (options.yes) {
    console.log(info('Restart when convenient, then run the installer again.'));
    return;
  }
  if (!(await confirmRestart(RESTART_DELAY_SECONDS))) {
    console.log(info('Restart when convenient, then run the installer again.'));
    return;
  }
  const outcome = await restartComputer(RESTART_DELAY_SECONDS, ctx.run);
  if (outcome.ok) {
    console.log(success(`Restarting in ${RESTART_DELAY_SECONDS} seconds`));
  } else {
    console.log(error(`Could not restart: ${failureReason(outcome)}`));
  }
}

/**
 * Run steps with a spinner per step, stopping at the next step boundary on
 * Ctrl+C.
 */
export async function executeSteps(steps: readonly StepDefinition[], ctx: StepContext): Promise<RunReport> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) process.exit(130);
    controller.abort();
    console.log('');
    console.log(warn('Stopping after the current step (Ctrl+C again to quit now)'));
  };
  process.on('SIGINT', onInterrupt);

  let spinner: Ora | null = null;
  try {
    return await runSteps(steps, ctx, {
      signal: controller.signal,
      onStepStart: (step, index, total) => {
        spinner = ora(`[${index + 1}/${total}] ${step.label}...`).start();
      },
      onProbe: (step, state, probeError) => {
        debug(`${step.id}: ${state}`);
        if (probeError) debug(probeError.message);
      },
      onStepEnd: (outcome) => {
        const elapsed = chalk.dim(` (${formatDuration(outcome.durationMs)})`);
        if (outcome.status === 'skipped') {
          spinner?.stopAndPersist({ symbol: '', text: skipped(`${outcome.label} — already satisfied`) });
        } else if (outcome.status === 'succeeded') {
          spinner?.succeed(chalk.green(outcome.label) + elapsed);
        } else {
          spinner?.fail(chalk.red(outcome.label) + elapsed);
          if (outcome.error) console.log(info(describeError(outcome.error.cause ?? outcome.error)));
        }
        spinner = null;
      },
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

/**
 * Run the requested steps (all by default) and print a
 * summary. Resolves to the process exit code.
 */
export async function installCommand(
  ctx: StepContext,
  stepIds: readonly StepId[] | undefined,
  options: InstallOptions = {},
): Promise<number> {
  console.log(header('Devbox Setup — Install'));
  console.log('');

  if (!(await ensureNetwork(ctx, options))) {
    console.log(error('Cancelled: network is required.'));
    return 1;
  }
  console.log('');

  const report = await executeSteps(selectSteps(stepIds), ctx);
  printReport(report);

  if (report.haltedBy) {
    console.log('');
    console.log(error('A required prerequisite is missing; nothing else was run.'));
    return 1;
  }
  if (report.cancelled) {
    console.log('');
    console.log(warn('Stopped before all steps ran.'));
  }
  if (report.restartRequired) {
    await offerRestart(options, ctx);
  }
  console.log('');
  return 0;
}
