import { CollaboratorTimeoutError } from '@siteline/core';

export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 10_000;

export interface TimeoutOptions {
  readonly operation: string;
  readonly timeoutMs: number;
}

/**
 * Races a collaborator call against a timer. The timer is always cleared once
 * the call settles; a late result from the collaborator is discarded. The
 * signal handed to the call aborts with the timeout error when the timer fires.
 */
export const withTimeout = async <T>(
  call: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> => {
  const controller = new AbortController();
  if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
    return call(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CollaboratorTimeoutError(options.operation, options.timeoutMs);
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
  }
};
