import { describe, expect, it } from 'vitest';
import { FakeRunner } from '../__tests__/fake-runner.js';
import {
  getDefaultVersion,
  getWslStatus,
  installDistribution,
  listDistributions,
  parseDefaultVersion,
  parseDistributionList,
} from './wsl.js';

const LIST_OUTPUT = [
  '  NAME            STATE           VERSION',
  '* Ubuntu-22.04    Stopped         2',
  '  docker-desktop  Running         2',
  '  Legacy          Stopped         1',
].join('\n');

describe('parseDistributionList', () => {
  it('reads name, state, version and the default marker', () => {
    expect(parseDistributionList(LIST_OUTPUT)).toEqual([
      { name: 'Ubuntu-22.04', state: 'Stopped', version: 2, isDefault: true },
      { name: 'docker-desktop', state: 'Running', version: 2, isDefault: false },
      { name: 'Legacy', state: 'Stopped', version: 1, isDefault: false },
    ]);
  });

  it('skips a translated header row', () => {
    const localized = ['  NOM             ÉTAT            VERSION', '* Debian          Arrêté          2'].join('\n');

    expect(parseDistributionList(localized)).toEqual([
      { name: 'Debian', state: 'Arrêté', version: 2, isDefault: true },
    ]);
  });

  it('returns an empty list for a header-only table', () => {
    expect(parseDistributionList('  NAME      STATE           VERSION\n')).toEqual([]);
  });
});

describe('parseDefaultVersion', () => {
  it('finds the default version line', () => {
    expect(parseDefaultVersion('Default Distribution: Ubuntu\nDefault Version: 2')).toBe(2);
  });

  it('returns null when the line is missing', () => {
    expect(parseDefaultVersion('WSL version: 2.0.9.0')).toBeNull();
  });
});

describe('wsl.exe client', () => {
  it('decodes wsl.exe output as UTF-16LE', async () => {
    const runner = new FakeRunner().on('wsl.exe', ['--list', '--verbose'], { stdout: LIST_OUTPUT });

    const distributions = await listDistributions({ run: runner.run, timeoutMs: 5000 });

    expect(distributions.map((d) => d.name)).toEqual(['Ubuntu-22.04', 'docker-desktop', 'Legacy']);
    expect(runner.calls[0].options).toEqual({ timeoutMs: 5000, encoding: 'utf16le' });
  });

  it('treats a failing list as no distributions', async () => {
    const runner = new FakeRunner().on('wsl.exe', ['--list'], {
      exitCode: 4294967295,
      stdout: 'Windows Subsystem for Linux has no installed distributions.',
    });

    expect(await listDistributions({ run: runner.run })).toEqual([]);
  });

  it('reports null rather than an empty list when wsl.exe cannot be run', async () => {
    const runner = new FakeRunner().on('wsl.exe', ['--list'], { exitCode: null, message: 'spawn wsl.exe ENOENT' });

    expect(await listDistributions({ run: runner.run })).toBeNull();
  });

  it('reads a timed out --status as unknown', async () => {
    const runner = new FakeRunner().on('wsl.exe', ['--status'], { exitCode: null, timedOut: true });

    expect(await getWslStatus({ run: runner.run })).toBe('unknown');
  });

  it('maps --status exit codes to installed / not-installed', async () => {
    const installed = new FakeRunner().on('wsl.exe', ['--status'], { stdout: 'Default Version: 2' });
    const missing = new FakeRunner().on('wsl.exe', ['--status'], { exitCode: 1 });

    expect(await getWslStatus({ run: installed.run })).toBe('installed');
    expect(await getWslStatus({ run: missing.run })).toBe('not-installed');
    expect(await getDefaultVersion({ run: installed.run })).toBe(2);
    expect(await getDefaultVersion({ run: missing.run })).toBeNull();
  });

  it('installs a distribution without launching it', async () => {
    const runner = new FakeRunner().on('wsl.exe', ['--install'], {});

    const outcome = await installDistribution('Ubuntu-22.04', { run: runner.run });

    expect(outcome.ok).toBe(true);
    expect(runner.calls[0].args).toEqual(['--install', '--distribution', 'Ubuntu-22.04', '--no-launch']);
  });
});
