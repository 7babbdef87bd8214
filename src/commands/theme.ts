import chalk from 'chalk';
import { ANSI_ROLES, type ColorScheme } from '../settings/schemes.js';
import { STEPS } from '../steps/registry.js';
import type { StepContext } from '../steps/types.js';
import { header, info } from '../ui/format.js';
import { printReport } from '../ui/report.js';
import { executeSteps } from './install.js';

/**
 * One block per ANSI color, in role order.
 */
export function swatch(scheme: ColorScheme): string {
  return ANSI_ROLES.map((role) => chalk.bgHex(scheme[role])('  ')).join('');
}

/**
 * Merge the configured color scheme into the terminal
 * settings. Edits a per-user file, so the administrator check is skipped.
 */
export async function themeCommand(ctx: StepContext): Promise<number> {
  const scheme = ctx.config.colorScheme;
  console.log(header('Devbox Setup — Color Scheme'));
  console.log(info(`${scheme.name}  ${swatch(scheme)}`));
  console.log(info(`Profiles matching "${ctx.config.profileMarker}" in ${ctx.settingsPath}`));
  console.log('');

  const report = await executeSteps([STEPS['apply-color-scheme']], ctx);
  printReport(report);
  console.log('');
  return report.failed.length > 0 ? 1 : 0;
}
