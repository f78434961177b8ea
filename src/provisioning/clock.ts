import type { Clock } from './types';

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>(resolve => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    })
};

/**
 * Virtual time. sleep() advances the clock by the requested amount and
 * resolves immediately, so waits finish in a single tick.
 *
 * Used by `plan` and by the test suites; onSleep lets a caller change the
 * world between polling rounds.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time = 0, private readonly onSleep?: (clock: ManualClock) => void | Promise<void>) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    this.sleeps.push(ms);
    this.time += ms;
    await this.onSleep?.(this);
  }

  advance(ms: number): void {
    this.time += ms;
  }
}
