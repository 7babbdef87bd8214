import chalk from 'chalk';
import { describeError } from '../core/errors.js';
import type { RunReport } from '../steps/orchestrator.js';
import type { StepOutcome } from '../steps/types.js';
import { error, formatDuration, info, sectionTitle, skipped, success, tableRow } from './format.js';

export function outcomeLine(outcome: StepOutcome): string {
  const suffix = chalk.dim(` (${formatDuration(outcome.durationMs)})`);
  switch (outcome.status) {
    case 'succeeded':
      return success(outcome.label) + suffix;
    case 'skipped':
      return skipped(`${outcome.label} — already satisfied`);
    case 'failed':
      return error(outcome.label) + suffix;
  }
}

/**
 * Print the per-step summary and totals of a run.
 */
export function printReport(report: RunReport): void {
  console.log(sectionTitle('Summary'));
  for (const outcome of report.outcomes) {
    console.log(outcomeLine(outcome));
    if (outcome.error) {
      console.log(info(describeError(outcome.error.cause ?? outcome.error)));
    } else if (outcome.note) {
      console.log(info(outcome.note));
    }
  }
  console.log('');
  console.log(tableRow('Succeeded', report.succeeded.length));
  console.log(tableRow('Already satisfied', report.skipped.length));
  console.log(tableRow('Failed', report.failed.length));
  console.log(tableRow('Elapsed', formatDuration(report.elapsedMs)));
}
