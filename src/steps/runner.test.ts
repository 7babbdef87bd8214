import { describe, expect, it, vi } from 'vitest';
import { makeContext, makeStep } from '../__tests__/context.js';
import { PrerequisiteMissingError, ProbeError, StepExecutionError } from '../core/errors.js';
import { err, ok } from '../core/result.js';
import { runStep } from './runner.js';
import type { InstallationState } from './types.js';

describe('runStep', () => {
  it('reports "already satisfied" on every run once the probe reads present', async () => {
    const action = vi.fn(async () => ok({}));
    const step = makeStep('install-terminal', { probe: async () => 'present', action });
    const ctx = makeContext();

    const first = await runStep(step, ctx);
    const second = await runStep(step, ctx);

    expect(first).toEqual({ ok: true, value: { alreadySatisfied: true } });
    expect(second).toEqual({ ok: true, value: { alreadySatisfied: true } });
    expect(action).not.toHaveBeenCalled();
  });

  it('runs the action when the probe reads absent', async () => {
    const action = vi.fn(async () => ok({ note: 'installed', restartRequired: true }));
    const step = makeStep('install-wsl', { probe: async () => 'absent', action });

    const result = await runStep(step, makeContext());

    expect(result).toEqual({
      ok: true,
      value: { alreadySatisfied: false, note: 'installed', restartRequired: true },
    });
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('downgrades a throwing probe to unknown and still acts', async () => {
    const action = vi.fn(async () => ok({}));
    const onProbe = vi.fn();
    const step = makeStep('apply-color-scheme', {
      probe: async (): Promise<InstallationState> => {
        throw new Error('settings unreadable');
      },
      action,
    });

    const result = await runStep(step, makeContext(), { onProbe });

    expect(result.ok).toBe(true);
    expect(action).toHaveBeenCalledTimes(1);
    expect(onProbe).toHaveBeenCalledWith(step, 'unknown', expect.any(ProbeError));
  });

  it('wraps a failed action in StepExecutionError', async () => {
    const step = makeStep('install-packages', { action: async () => err(new Error('Could not install Git')) });

    const result = await runStep(step, makeContext());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StepExecutionError);
    expect(result.error.step).toBe('install-packages');
    expect(result.error.message).toBe('Could not install Git');
    expect(result.error.critical).toBe(false);
  });

  it('turns a thrown error into a failed result', async () => {
    const step = makeStep('apply-color-scheme', {
      action: async () => {
        throw new Error('disk full');
      },
    });

    const result = await runStep(step, makeContext());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('disk full');
  });

  it('carries the critical flag and the original cause', async () => {
    const cause = new PrerequisiteMissingError('Administrator rights are required');
    const step = makeStep('verify-prerequisites', { critical: true, action: async () => err(cause) });

    const result = await runStep(step, makeContext());

    if (result.ok) throw new Error('expected failure');
    expect(result.error.critical).toBe(true);
    expect(result.error.cause).toBe(cause);
  });
});
