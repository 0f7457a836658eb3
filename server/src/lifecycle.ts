import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import type { ServerConfig } from './config.js';
import { startRotationTicker, type RotationTicker } from './domain/rotation-ticker.js';
import type { SlidingWindowCounter } from './domain/sliding-window-counter.js';
import { BUCKET_SECONDS } from './types/state.js';
import type { Logger } from './utils/log.js';

export type ExitFn = (code: number) => void;

export interface ShutdownDeps {
  counter: SlidingWindowCounter;
  ticker: RotationTicker;
  log: Logger;
  exit: ExitFn;
}

/**
 * Final flush on a signal. The process exits either way; a failed flush is
 * logged at fatal and turns the exit status into 1.
 */
export function createShutdownHandler({ counter, ticker, log, exit }: ShutdownDeps): (signal: NodeJS.Signals) => void {
  return (signal) => {
    ticker.stop();
    try {
      counter.flush();
    } catch (err) {
      log.fatal({ err, signal }, 'final flush failed');
      exit(1);
      return;
    }
    log.info({ signal }, 'stopping server');
    exit(0);
  };
}

export interface RunningServer {
  app: FastifyInstance;
  ticker: RotationTicker;
  shutdown: (signal: NodeJS.Signals) => void;
}

export type ServerSettings = Pick<ServerConfig, 'host' | 'port' | 'requestTimeoutMs'>;

/**
 * Loads the stored counter, starts the rotation ticker and listens. A corrupt
 * state file throws from `load()` before anything is scheduled or bound.
 */
export async function startServer(
  counter: SlidingWindowCounter,
  settings: ServerSettings,
  log: Logger,
  exit: ExitFn
): Promise<RunningServer> {
  counter.load();
  log.info({ windowTotal: counter.windowTotal() }, 'request counter loaded');

  const ticker = startRotationTicker(counter, {
    intervalMs: BUCKET_SECONDS * 1000,
    log,
    onFatal: (err) => {
      log.fatal({ err }, 'could not persist request counter');
      exit(1);
    }
  });

  const app = buildApp(counter, { log, requestTimeoutMs: settings.requestTimeoutMs });
  try {
    await app.listen({ port: settings.port, host: settings.host });
  } catch (err) {
    ticker.stop();
    throw err;
  }
  log.info({ host: settings.host, port: settings.port }, 'listening');

  return {
    app,
    ticker,
    shutdown: createShutdownHandler({ counter, ticker, log, exit })
  };
}
