#!/usr/bin/env node
import { ZodError } from 'zod';
import { loadConfig, type ServerConfig } from './config.js';
import { FileStateStore } from './db/state-file.js';
import { SlidingWindowCounter } from './domain/sliding-window-counter.js';
import { startServer } from './lifecycle.js';
import { createLogger } from './utils/log.js';

function readConfig(): ServerConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    const details = error instanceof ZodError ? error.flatten().fieldErrors : error;
    console.error('[config] FATAL: invalid environment', details);
    process.exit(1);
  }
}

const config = readConfig();
const log = createLogger(config.logLevel);
const exit = (code: number): void => process.exit(code);

async function main(): Promise<void> {
  log.info({ stateFile: config.stateFile }, 'launching server');

  const counter = new SlidingWindowCounter(new FileStateStore(config.stateFile));
  const { shutdown } = await startServer(counter, config, log, exit);

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  log.info('type CTRL-C to stop the server');
}

main().catch((error) => {
  log.fatal({ err: error }, 'server stopped');
  process.exit(1);
});
