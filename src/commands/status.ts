import chalk from 'chalk';
import ora from 'ora';
import { existsSync } from 'fs';
import { probeStep } from '../steps/probe.js';
import { listSteps } from '../steps/registry.js';
import type { InstallationState, StepContext } from '../steps/types.js';
import { isElevated } from '../tools/system.js';
import { header, info, sectionTitle, tableRow, warn } from '../ui/format.js';

function describeState(state: InstallationState): string {
  switch (state) {
    case 'present':
      return chalk.green('done');
    case 'absent':
      return chalk.yellow('pending');
    case 'unknown':
      return chalk.dim('unknown');
  }
}

/**
 * Probe every step and show what a full install would do.
 * Read-only.
 */
export async function statusCommand(ctx: StepContext): Promise<void> {
  console.log(header('Devbox Setup — Status'));
  console.log('');

  if (ctx.platform !== 'win32') {
    console.log(warn('Not running on Windows; every check below will read as pending or unknown.'));
    console.log('');
  }

  console.log(sectionTitle('Environment'));
  console.log(tableRow('Administrator', (await isElevated(ctx.run)) ? chalk.green('yes') : chalk.yellow('no')));
  console.log(tableRow('Distribution', ctx.config.distribution));
  console.log(tableRow('WSL version', String(ctx.config.wslVersion)));
  console.log(tableRow('Color scheme', ctx.config.colorScheme.name));
  console.log(tableRow('Settings file', existsSync(ctx.settingsPath) ? ctx.settingsPath : chalk.dim('not found')));
  console.log('');

  console.log(sectionTitle('Steps'));
  const spinner = ora('Checking...').start();
  const rows: string[] = [];
  const problems: string[] = [];
  for (const step of listSteps()) {
    if (!step.probe) continue;
    spinner.text = `Checking ${step.label.toLowerCase()}...`;
    const reading = await probeStep(step, ctx);
    rows.push(tableRow(step.label, describeState(reading.state), 40));
    if (reading.error) problems.push(reading.error.message);
  }
  spinner.stop();

  for (const row of rows) console.log(row);
  for (const problem of problems) console.log(info(problem));
  console.log('');
}
