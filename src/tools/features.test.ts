import { describe, expect, it } from 'vitest';
import { FakeRunner } from '../__tests__/fake-runner.js';
import { getFeatureState, parseFeatureState, setFeatureState, WSL_FEATURE } from './features.js';

function featureInfo(state: string): string {
  return [
    'Deployment Image Servicing and Management tool',
    'Version: 10.0.22621.2792',
    '',
    'Feature Information:',
    '',
    'Feature Name : Microsoft-Windows-Subsystem-Linux',
    'Display Name : Windows Subsystem for Linux',
    'Restart Required : Possible',
    `State : ${state}`,
    '',
    'The operation completed successfully.',
  ].join('\n');
}

describe('parseFeatureState', () => {
  it.each([
    ['Enabled', 'enabled'],
    ['Enable Pending', 'enabled'],
    ['Disabled', 'disabled'],
    ['Disable Pending', 'disabled'],
    ['Disabled with Payload Removed', 'disabled'],
    ['Staged', 'unknown'],
  ] as const)('classifies "%s" as %s', (state, expected) => {
    expect(parseFeatureState(featureInfo(state))).toBe(expected);
  });

  it('does not mistake "Restart Required" for the state line', () => {
    expect(parseFeatureState('Restart Required : Possible')).toBe('unknown');
  });
});

describe('getFeatureState', () => {
  it('queries dism in English', async () => {
    const runner = new FakeRunner().on('dism.exe', ['/online'], { stdout: featureInfo('Enabled') });

    expect(await getFeatureState(WSL_FEATURE, { run: runner.run })).toBe('enabled');
    expect(runner.calls[0].args).toEqual([
      '/online', '/English', '/Get-FeatureInfo', '/FeatureName:Microsoft-Windows-Subsystem-Linux',
    ]);
  });

  it('reads unknown when dism fails', async () => {
    const runner = new FakeRunner().on('dism.exe', ['/online'], { exitCode: 740, stdout: 'Elevated permissions are required' });

    expect(await getFeatureState(WSL_FEATURE, { run: runner.run })).toBe('unknown');
  });
});

describe('setFeatureState', () => {
  it('treats exit code 3010 as success that needs a restart', async () => {
    const runner = new FakeRunner().on('dism.exe', ['/online', '/Enable-Feature'], { exitCode: 3010 });

    const change = await setFeatureState(WSL_FEATURE, true, { run: runner.run });

    expect(change.ok).toBe(true);
    expect(change.restartRequired).toBe(true);
    expect(runner.calls[0].args).toEqual([
      '/online', '/Enable-Feature', '/FeatureName:Microsoft-Windows-Subsystem-Linux', '/All', '/NoRestart',
    ]);
  });

  it('reports other non-zero exits as failures', async () => {
    const runner = new FakeRunner().on('dism.exe', ['/online'], { exitCode: 87 });

    const change = await setFeatureState(WSL_FEATURE, false, { run: runner.run });

    expect(change.ok).toBe(false);
    expect(change.restartRequired).toBe(false);
    expect(runner.calls[0].args[1]).toBe('/Disable-Feature');
  });
});
