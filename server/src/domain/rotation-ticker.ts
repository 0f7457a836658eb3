import type { Logger } from '../utils/log.js';
import type { SlidingWindowCounter } from './sliding-window-counter.js';

export interface RotationTickerOptions {
  intervalMs: number;
  onFatal: (err: unknown) => void;
  log?: Logger;
}

export interface RotationTicker {
  stop(): void;
}

/**
 * Closes one bucket per interval and persists the result. A failed flush
 * stops the ticker and is handed to `onFatal`; it is never retried.
 */
export function startRotationTicker(counter: SlidingWindowCounter, opts: RotationTickerOptions): RotationTicker {
  const timer = setInterval(() => {
    counter.rotate();
    try {
      counter.flush();
    } catch (err) {
      clearInterval(timer);
      opts.onFatal(err);
      return;
    }
    opts.log?.trace({ windowTotal: counter.windowTotal() }, 'window rotated');
  }, opts.intervalMs);

  return {
    stop: () => clearInterval(timer)
  };
}
