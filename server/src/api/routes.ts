import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { SlidingWindowCounter } from '../domain/sliding-window-counter.js';
import { BUCKET_SECONDS, WINDOW_BUCKETS } from '../types/state.js';

const htmlEscapes: Record<string, string> = {
  '&': '&amp;',
  "'": '&#39;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;'
};

export function escapeHtml(value: string): string {
  return value.replace(/[&'<>"]/g, (ch) => htmlEscapes[ch] ?? ch);
}

/** Renders a whole-second duration as `1m0s`, `45s`, ... */
export function formatWindow(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return minutes > 0 ? `${minutes}m${rest}s` : `${rest}s`;
}

export function renderReport(total: number, now: Date): string {
  return `Served ${total} requests in the last ${formatWindow(WINDOW_BUCKETS * BUCKET_SECONDS)}\n` +
    `The time is: ${now.toUTCString()}\n`;
}

/** Decoded path of a raw request URL, without the query string. */
export function requestPath(url: string): string {
  const raw = url.split('?', 1)[0];
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function methodNotAllowed(reply: FastifyReply): FastifyReply {
  return reply.code(405).header('allow', 'GET').send();
}

export function registerReportRoutes(app: FastifyInstance, counter: SlidingWindowCounter, clock: () => Date = () => new Date()): void {
  app.all('/', async (request: FastifyRequest, reply: FastifyReply) => {
    if (request.method !== 'GET') {
      return methodNotAllowed(reply);
    }

    counter.increment();
    return reply
      .code(200)
      .type('text/plain; charset=utf-8')
      .send(renderReport(counter.windowTotal(), clock()));
  });

  // Methods the router does not know (PURGE, ...) never reach the route above.
  app.setNotFoundHandler((request, reply) => {
    const path = requestPath(request.url);
    if (path === '/') {
      methodNotAllowed(reply);
      return;
    }
    reply
      .code(404)
      .type('text/plain; charset=utf-8')
      .send(`Requested resource '${escapeHtml(path)}' does not exist\n`);
  });
}
