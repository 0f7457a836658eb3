import { createServer } from 'node:http';
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { registerReportRoutes } from './api/routes.js';
import type { SlidingWindowCounter } from './domain/sliding-window-counter.js';

/** Largest accepted request head, 1 MiB. */
export const MAX_HEADER_BYTES = 1 << 20;

export interface AppOptions {
  log?: FastifyBaseLogger;
  requestTimeoutMs?: number;
  clock?: () => Date;
}

export function buildApp(counter: SlidingWindowCounter, opts: AppOptions = {}): FastifyInstance {
  const logger: FastifyBaseLogger | boolean = opts.log ?? false;
  const timeoutMs = opts.requestTimeoutMs ?? 10_000;
  const app = Fastify({
    logger,
    exposeHeadRoutes: false,
    serverFactory: (handler) => {
      const server = createServer({ maxHeaderSize: MAX_HEADER_BYTES, requestTimeout: timeoutMs }, handler);
      server.setTimeout(timeoutMs);
      return server;
    }
  });

  // Request bodies are never read; accept any content type so that a body
  // on a non-GET request still ends in 405 rather than 415.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', (_request, _payload, done) => {
    done(null);
  });

  registerReportRoutes(app, counter, opts.clock);
  return app;
}
