import { describe, expect, it } from 'vitest';
import { FakeRunner } from '../__tests__/fake-runner.js';
import { NetworkUnavailableError } from '../core/errors.js';
import { checkConnectivity, isElevated, restartComputer } from './system.js';

describe('isElevated', () => {
  it('reads a successful net session as elevated', async () => {
    expect(await isElevated(new FakeRunner().on('net', ['session'], {}).run)).toBe(true);
    expect(await isElevated(new FakeRunner().on('net', ['session'], { exitCode: 2 }).run)).toBe(false);
  });
});

describe('checkConnectivity', () => {
  it('resolves when the host resolves', async () => {
    await expect(checkConnectivity('example.test', async () => ({ address: '192.0.2.1' }))).resolves.toBeUndefined();
  });

  it('wraps lookup failures in NetworkUnavailableError', async () => {
    const failure = new Error('getaddrinfo ENOTFOUND example.test');

    const attempt = checkConnectivity('example.test', async () => {
      throw failure;
    });

    await expect(attempt).rejects.toBeInstanceOf(NetworkUnavailableError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Cannot reach example.test; downloads will likely fail',
      cause: failure,
    });
  });
});

describe('restartComputer', () => {
  it('schedules a restart after the given delay', async () => {
    const runner = new FakeRunner().on('shutdown.exe', ['/r'], {});

    const outcome = await restartComputer(30, runner.run);

    expect(outcome.ok).toBe(true);
    expect(runner.calls[0].args).toEqual(['/r', '/t', '30']);
  });
});
