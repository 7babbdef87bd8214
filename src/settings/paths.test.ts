import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { resolveSettingsPath, settingsCandidates } from './paths.js';

const env = { LOCALAPPDATA: join('C:', 'Users', 'dev', 'AppData', 'Local') };
const [stable, preview, unpackaged] = settingsCandidates(env);

describe('resolveSettingsPath', () => {
  it('lists the Store, Preview and unpackaged locations in that order', () => {
    expect(stable).toBe(join(env.LOCALAPPDATA, 'Packages', 'Microsoft.WindowsTerminal_8wekyb3d8bbwe', 'LocalState', 'settings.json'));
    expect(preview).toBe(join(env.LOCALAPPDATA, 'Packages', 'Microsoft.WindowsTerminalPreview_8wekyb3d8bbwe', 'LocalState', 'settings.json'));
    expect(unpackaged).toBe(join(env.LOCALAPPDATA, 'Microsoft', 'Windows Terminal', 'settings.json'));
  });

  it('prefers an explicit override', () => {
    expect(resolveSettingsPath({ override: '/tmp/settings.json', env, exists: () => true })).toBe('/tmp/settings.json');
  });

  it('picks the first location that exists', () => {
    expect(resolveSettingsPath({ env, exists: (p) => p === unpackaged || p === preview })).toBe(preview);
  });

  it('falls back to the Store location when nothing exists yet', () => {
    expect(resolveSettingsPath({ env, exists: () => false })).toBe(stable);
  });
});
