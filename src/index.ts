#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { ConfigValidationError, describeError } from './core/errors.js';
import { createStepContext, type GlobalOptions } from './commands/context.js';
import { installCommand } from './commands/install.js';
import { interactiveMenu } from './commands/menu.js';
import { statusCommand } from './commands/status.js';
import { themeCommand } from './commands/theme.js';
import { listSteps } from './steps/registry.js';
import { isStepId, STEP_ORDER, type StepId } from './steps/types.js';
import { error, info, setVerbose, tableRow } from './ui/format.js';

function parseStepId(value: string, previous: StepId[] = []): StepId[] {
  if (!isStepId(value)) {
    throw new InvalidArgumentError(`Unknown step. Choose from: ${STEP_ORDER.join(', ')}`);
  }
  return [...previous, value];
}

async function main(argv: string[]): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name('devbox-setup')
    .description('Set up a Windows development workstation: WSL, Windows Terminal and developer tools')
    .version('0.1.0')
    .option('-c, --config <path>', 'Installer config file (default ~/.devbox-setup.json)')
    .option('--verbose', 'Print every external command and probe result')
    .hook('preAction', (command) => {
      setVerbose(command.opts<GlobalOptions>().verbose === true);
    });

  program
    .command('install')
    .description('Run installation steps (all of them when none are named)')
    .argument('[steps...]', 'Step ids to run', parseStepId)
    .option('-y, --yes', 'Skip confirmation prompts')
    .option('--offline', 'Skip the network check')
    .action(async (steps: StepId[] | undefined, opts: { yes?: boolean; offline?: boolean }) => {
      const ctx = createStepContext(program.opts<GlobalOptions>());
      exitCode = await installCommand(ctx, steps && steps.length > 0 ? steps : undefined, opts);
    });

  program
    .command('status')
    .description('Check what is already installed')
    .action(async () => {
      await statusCommand(createStepContext(program.opts<GlobalOptions>()));
    });

  program
    .command('theme')
    .description('Apply the color scheme to Windows Terminal profiles')
    .option('--settings <path>', 'Path to the terminal settings.json')
    .action(async (opts: { settings?: string }) => {
      exitCode = await themeCommand(createStepContext(program.opts<GlobalOptions>(), opts.settings));
    });

  program
    .command('steps')
    .description('List step ids in the order they run')
    .action(() => {
      for (const step of listSteps()) {
        console.log(tableRow(step.id, step.label, 26));
      }
    });

  program
    .command('menu', { isDefault: true, hidden: true })
    .description('Interactive menu')
    .action(async () => {
      exitCode = await interactiveMenu(createStepContext(program.opts<GlobalOptions>()));
    });

  await program.parseAsync(argv);
  return exitCode;
}

try {
  process.exitCode = await main(process.argv);
} catch (err) {
  if (err instanceof Error && err.name === 'ExitPromptError') {
    // Ctrl+C at a prompt
    process.exitCode = 130;
  } else if (err instanceof ConfigValidationError) {
    console.error(error(err.message));
    process.exitCode = 1;
  } else {
    console.error(error(describeError(err)));
    console.error(info('Re-run with --verbose for the external commands that ran.'));
    process.exitCode = 1;
  }
}
