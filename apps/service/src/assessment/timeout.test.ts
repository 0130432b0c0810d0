import { describe, expect, it } from 'vitest';

import { CollaboratorTimeoutError } from '@siteline/core';

import { withTimeout } from './timeout.js';

describe('withTimeout', () => {
  it('resolves with the collaborator result when it settles in time', async () => {
    await expect(
      withTimeout(() => Promise.resolve('ok'), { operation: 'geocoder.resolve', timeoutMs: 50 })
    ).resolves.toBe('ok');
  });

  it('propagates collaborator errors unchanged', async () => {
    await expect(
      withTimeout(() => Promise.reject(new Error('registry offline')), {
        operation: 'landRegistry.lookup',
        timeoutMs: 50
      })
    ).rejects.toThrow('registry offline');
  });

  it('rejects with CollaboratorTimeout when the call hangs', async () => {
    const pending = withTimeout(() => new Promise<string>(() => undefined), {
      operation: 'gridInfrastructure.nearestHub',
      timeoutMs: 5
    });

    await expect(pending).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    await expect(pending).rejects.toThrow('gridInfrastructure.nearestHub did not respond within 5ms.');
  });

  it('aborts the signal handed to the call with the timeout error', async () => {
    let received: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        received = signal;
        return new Promise<string>(() => undefined);
      },
      { operation: 'reportAnalysis.extractFindings', timeoutMs: 5 }
    );

    await expect(pending).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    expect(received?.aborted).toBe(true);
    expect(received?.reason).toBeInstanceOf(CollaboratorTimeoutError);
  });

  it('leaves the signal untouched when the call settles in time', async () => {
    let received: AbortSignal | undefined;

    await withTimeout(
      (signal) => {
        received = signal;
        return Promise.resolve('ok');
      },
      { operation: 'geocoder.resolve', timeoutMs: 50 }
    );

    expect(received?.aborted).toBe(false);
  });

  it('skips the timer when the limit is disabled', async () => {
    await expect(
      withTimeout(() => Promise.resolve(3), { operation: 'legalSearch.hasLawsuits', timeoutMs: 0 })
    ).resolves.toBe(3);
  });
});
