import chalk from 'chalk';
import { select, Separator } from '@inquirer/prompts';
import { listSteps, selectSteps } from '../steps/registry.js';
import type { StepContext, StepId } from '../steps/types.js';
import { DIVIDER } from '../ui/format.js';
import { printReport } from '../ui/report.js';
import { installCommand, executeSteps, type InstallOptions } from './install.js';
import { statusCommand } from './status.js';

export type MenuAction =
  | { kind: 'all' }
  | { kind: 'step'; step: StepId }
  | { kind: 'status' }
  | { kind: 'exit' };

function assertNever(value: never): never {
  throw new Error(`Unhandled menu action: ${JSON.stringify(value)}`);
}

export function menuChoices(): Array<{ name: string; value: MenuAction } | Separator> {
  return [
    { name: 'Install everything', value: { kind: 'all' } },
    new Separator(),
    ...listSteps().map((step, index) => ({
      name: `${String(index + 1).padStart(2)}. ${step.label}`,
      value: { kind: 'step', step: step.id } satisfies MenuAction,
    })),
    new Separator(),
    { name: 'Status', value: { kind: 'status' } },
    { name: 'Exit', value: { kind: 'exit' } },
  ];
}

/**
 * Interactive menu loop. Resolves to the exit code when the user leaves
 * or a prerequisite is missing.
 */
export async function interactiveMenu(ctx: StepContext, options: InstallOptions = {}): Promise<number> {
  while (true) {
    console.log(`\n${chalk.bold.cyan('Devbox Setup')}${chalk.dim(` [${ctx.config.distribution}]`)}`);
    console.log(chalk.dim(DIVIDER));
    console.log('');

    const action = await select<MenuAction>({
      message: 'What would you like to do?',
      choices: menuChoices(),
      pageSize: 16,
    });

    switch (action.kind) {
      case 'all': {
        const code = await installCommand(ctx, undefined, options);
        if (code !== 0) return code;
        break;
      }
      case 'step': {
        const report = await executeSteps(selectSteps([action.step]), ctx);
        printReport(report);
        if (report.haltedBy) return 1;
        break;
      }
      case 'status':
        await statusCommand(ctx);
        break;
      case 'exit':
        console.log(chalk.dim('\nGoodbye!\n'));
        return 0;
      default:
        return assertNever(action);
    }
  }
}
