import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ColorSchemeSchema, COOLNIGHT, type ColorScheme } from '../settings/schemes.js';
import { ConfigValidationError } from './errors.js';

export interface PackageSpec {
  id: string;
  label: string;
}

export interface Timeouts {
  /** Read-only queries: winget list, wsl --status, dism /Get-FeatureInfo. */
  probeMs: number;
  /** Anything that downloads or installs. */
  installMs: number;
}

export interface InstallerConfig {
  version: number;
  colorScheme: ColorScheme;
  /** Profiles whose source, commandline or name contains this get the scheme. */
  profileMarker: string;
  distribution: string;
  wslVersion: number;
  terminalPackageId: string;
  packages: PackageSpec[];
  settingsPath?: string;
  connectivityHost: string;
  timeouts: Timeouts;
}

const CONFIG_FILENAME = '.devbox-setup.json';

const PackageSpecSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
});

const ConfigFileSchema = z
  .object({
    version: z.literal(1),
    colorScheme: ColorSchemeSchema,
    profileMarker: z.string().min(1),
    distribution: z.string().regex(/^\S+$/, 'distribution names cannot contain spaces'),
    wslVersion: z.union([z.literal(1), z.literal(2)]),
    terminalPackageId: z.string().min(1),
    packages: z.array(PackageSpecSchema),
    settingsPath: z.string().min(1),
    connectivityHost: z.string().min(1),
    timeouts: z
      .object({
        probeMs: z.number().int().positive(),
        installMs: z.number().int().positive(),
      })
      .partial(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.DEVBOX_SETUP_CONFIG || join(homedir(), CONFIG_FILENAME);
}

export function defaultConfig(): InstallerConfig {
  return {
    version: 1,
    colorScheme: { ...COOLNIGHT },
    profileMarker: 'wsl',
    distribution: 'Ubuntu-22.04',
    wslVersion: 2,
    terminalPackageId: 'Microsoft.WindowsTerminal',
    packages: [
      { id: 'Git.Git', label: 'Git' },
      { id: 'Microsoft.VisualStudioCode', label: 'Visual Studio Code' },
      { id: 'Microsoft.PowerShell', label: 'PowerShell 7' },
      { id: 'OpenJS.NodeJS.LTS', label: 'Node.js LTS' },
    ],
    connectivityHost: 'cdn.winget.microsoft.com',
    timeouts: {
      probeMs: 60_000,
      installMs: 45 * 60_000,
    },
  };
}

export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Lay validated overrides over the defaults. Timeouts merge field by field;
 * everything else replaces the default wholesale.
 */
export function mergeConfig(base: InstallerConfig, overrides: ConfigOverrides): InstallerConfig {
  const { timeouts, ...rest } = overrides;
  return {
    ...base,
    ...rest,
    timeouts: { ...base.timeouts, ...timeouts },
  };
}

export function parseConfig(raw: string, path: string): InstallerConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(path, ['not valid JSON'], { cause: err });
  }
  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigValidationError(
      path,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return mergeConfig(defaultConfig(), result.data);
}

export interface LoadConfigOptions {
  /** The path was named by the user, so a missing file is an error. */
  required?: boolean;
}

/**
 * Load the installer configuration: defaults, overridden by the user's
 * config file when one exists. The returned value is frozen.
 */
export function loadConfig(path: string = getConfigPath(), options: LoadConfigOptions = {}): Readonly<InstallerConfig> {
  if (!existsSync(path)) {
    if (options.required) {
      throw new ConfigValidationError(path, ['file not found']);
    }
    return deepFreeze(defaultConfig());
  }
  return deepFreeze(parseConfig(readFileSync(path, 'utf-8'), path));
}
