import { CancellationError } from './errors';

export const CLOCK = Symbol('CLOCK');

export interface Clock {
  now(): number;
  /** Resolves after `ms`; rejects with CancellationError as soon as `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancellationError('Cancelled'));
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancellationError('Cancelled'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};
