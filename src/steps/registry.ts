import { PrerequisiteMissingError } from '../core/errors.js';
import { err, ok, type Result } from '../core/result.js';
import { createProfileSelector } from '../settings/merge.js';
import { applyColorSchemeToFile, isColorSchemeApplied } from '../settings/settings-file.js';
import { failureReason, type CommandOutcome } from '../tools/exec.js';
import {
  getFeatureState,
  setFeatureState,
  VM_PLATFORM_FEATURE,
  WSL_FEATURE,
} from '../tools/features.js';
import { isElevated } from '../tools/system.js';
import { getPackageState, installPackage, isWingetAvailable } from '../tools/winget.js';
import {
  getDefaultVersion,
  getWslStatus,
  installDistribution,
  installWsl,
  listDistributions,
  setDefaultDistribution,
  setDefaultVersion,
} from '../tools/wsl.js';
import { fromFeatureState, fromPackageState, fromWslStatus, presentIf } from './probe.js';
import {
  STEP_ORDER,
  type ActionReport,
  type InstallationState,
  type StepContext,
  type StepDefinition,
  type StepId,
} from './types.js';

type ActionResult = Result<ActionReport, Error>;

const probing = (ctx: StepContext) => ({ timeoutMs: ctx.config.timeouts.probeMs, run: ctx.run });
const installing = (ctx: StepContext) => ({ timeoutMs: ctx.config.timeouts.installMs, run: ctx.run });

function fromOutcome(outcome: CommandOutcome, report: ActionReport = {}): ActionResult {
  return outcome.ok ? ok(report) : err(new Error(failureReason(outcome)));
}

function featureStep<K extends StepId>(id: K, label: string, feature: string): StepDefinition & { id: K } {
  return {
    id,
    label,
    critical: false,
    probe: async (ctx) => fromFeatureState(await getFeatureState(feature, probing(ctx))),
    action: async (ctx) => {
      const change = await setFeatureState(feature, true, installing(ctx));
      if (!change.ok) return err(new Error(failureReason(change.outcome)));
      return ok({
        restartRequired: change.restartRequired,
        note: change.restartRequired ? 'enabled; takes effect after a restart' : undefined,
      });
    },
  };
}

async function installTerminalPackage(ctx: StepContext): Promise<ActionResult> {
  const result = await installPackage(ctx.config.terminalPackageId, installing(ctx));
  if (!result.ok) return err(new Error(failureReason(result.outcome)));
  return ok({ note: result.alreadyInstalled ? 'already installed' : undefined });
}

/**
 * Every step, keyed by id. The mapped type makes a missing step a compile
 * error.
 */
export const STEPS: { readonly [K in StepId]: StepDefinition & { id: K } } = {
  'verify-prerequisites': {
    id: 'verify-prerequisites',
    label: 'Verify Windows and administrator rights',
    critical: true,
    action: async (ctx) => {
      if (ctx.platform !== 'win32') {
        return err(new PrerequisiteMissingError('This installer only runs on Windows'));
      }
      if (!(await isElevated(ctx.run))) {
        return err(new PrerequisiteMissingError('Administrator rights are required; re-run from an elevated terminal'));
      }
      if (!(await isWingetAvailable(ctx.run))) {
        return ok({ note: 'winget not found; package steps will fail until App Installer is installed' });
      }
      return ok({});
    },
  },

  'enable-wsl-feature': featureStep('enable-wsl-feature', 'Enable the WSL optional feature', WSL_FEATURE),

  'enable-vm-platform': featureStep('enable-vm-platform', 'Enable Virtual Machine Platform', VM_PLATFORM_FEATURE),

  'install-wsl': {
    id: 'install-wsl',
    label: 'Install WSL',
    critical: false,
    probe: async (ctx) => fromWslStatus(await getWslStatus(probing(ctx))),
    action: async (ctx) =>
      fromOutcome(await installWsl([], installing(ctx)), {
        restartRequired: true,
        note: 'installed; restart before installing a distribution',
      }),
  },

  'set-wsl-version': {
    id: 'set-wsl-version',
    label: 'Set the default WSL version',
    critical: false,
    probe: async (ctx): Promise<InstallationState> => {
      const version = await getDefaultVersion(probing(ctx));
      if (version === null) return 'unknown';
      return presentIf(version === ctx.config.wslVersion);
    },
    action: async (ctx) =>
      fromOutcome(await setDefaultVersion(ctx.config.wslVersion, installing(ctx)), {
        note: `default version ${ctx.config.wslVersion}`,
      }),
  },

  'install-distribution': {
    id: 'install-distribution',
    label: 'Install the Linux distribution',
    critical: false,
    probe: async (ctx): Promise<InstallationState> => {
      const distributions = await listDistributions(probing(ctx));
      if (distributions === null) return 'unknown';
      return presentIf(distributions.some((d) => d.name === ctx.config.distribution));
    },
    action: async (ctx) =>
      fromOutcome(await installDistribution(ctx.config.distribution, installing(ctx)), {
        note: `${ctx.config.distribution} installed; open it once to create your Linux user`,
      }),
  },

  'set-default-distribution': {
    id: 'set-default-distribution',
    label: 'Make the distribution the WSL default',
    critical: false,
    probe: async (ctx): Promise<InstallationState> => {
      const distributions = await listDistributions(probing(ctx));
      if (distributions === null) return 'unknown';
      const match = distributions.find((d) => d.name === ctx.config.distribution);
      return presentIf(match?.isDefault === true);
    },
    action: async (ctx) => fromOutcome(await setDefaultDistribution(ctx.config.distribution, installing(ctx))),
  },

  'install-terminal': {
    id: 'install-terminal',
    label: 'Install Windows Terminal',
    critical: false,
    probe: async (ctx) => fromPackageState(await getPackageState(ctx.config.terminalPackageId, probing(ctx))),
    action: installTerminalPackage,
  },

  'install-packages': {
    id: 'install-packages',
    label: 'Install developer tools',
    critical: false,
    probe: async (ctx): Promise<InstallationState> => {
      let unsure = false;
      for (const pkg of ctx.config.packages) {
        const state = fromPackageState(await getPackageState(pkg.id, probing(ctx)));
        if (state === 'absent') return 'absent';
        if (state === 'unknown') unsure = true;
      }
      return unsure ? 'unknown' : 'present';
    },
    action: async (ctx) => {
      const installed: string[] = [];
      const failures: string[] = [];
      for (const pkg of ctx.config.packages) {
        if ((await getPackageState(pkg.id, probing(ctx))) === 'installed') continue;
        const result = await installPackage(pkg.id, installing(ctx));
        if (result.ok) {
          installed.push(pkg.label);
        } else {
          failures.push(`${pkg.label}: ${failureReason(result.outcome)}`);
        }
      }
      if (failures.length > 0) {
        return err(new Error(`Could not install ${failures.join('; ')}`));
      }
      return ok({ note: installed.length > 0 ? `installed ${installed.join(', ')}` : undefined });
    },
  },

  'apply-color-scheme': {
    id: 'apply-color-scheme',
    label: 'Apply the terminal color scheme',
    critical: false,
    probe: async (ctx) => {
      const selector = createProfileSelector(ctx.config.profileMarker);
      return presentIf(isColorSchemeApplied(ctx.settingsPath, ctx.config.colorScheme, selector));
    },
    action: async (ctx) => {
      const scheme = ctx.config.colorScheme;
      const selector = createProfileSelector(ctx.config.profileMarker);
      const result = applyColorSchemeToFile(ctx.settingsPath, scheme, selector, { now: ctx.now });

      switch (result.kind) {
        case 'missing': {
          // No settings yet: the terminal is missing or has never been launched.
          const installed = await installTerminalPackage(ctx);
          if (!installed.ok) return installed;
          return ok({
            note: `no settings at ${result.path}; launch Windows Terminal once, then re-run this step`,
          });
        }
        case 'unchanged':
          return ok({ note: 'settings already up to date' });
        case 'updated': {
          const parts: string[] = [];
          if (result.schemeAdded) parts.push(`added "${scheme.name}"`);
          if (result.profilesUpdated.length > 0) {
            parts.push(`updated ${result.profilesUpdated.join(', ')}`);
          }
          return ok({ note: `${parts.join('; ')} (backup: ${result.backupPath})` });
        }
      }
    },
  },
};

/**
 * Resolve requested ids into runnable steps: declared order, no duplicates,
 * and the prerequisite check always first. No ids means every step.
 */
export function selectSteps(ids: readonly StepId[] = STEP_ORDER): StepDefinition[] {
  const wanted = new Set<StepId>(ids);
  wanted.add('verify-prerequisites');
  return STEP_ORDER.filter((id) => wanted.has(id)).map((id) => STEPS[id]);
}

export function listSteps(): StepDefinition[] {
  return STEP_ORDER.map((id) => STEPS[id]);
}
