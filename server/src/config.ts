import { z } from 'zod';

export interface ServerConfig {
  port: number;
  host: string;
  stateFile: string;
  requestTimeoutMs: number;
  logLevel: string;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  STATE_FILE: z.string().min(1).default('request-file.txt'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type ServerEnv = Record<string, string | undefined>;

/**
 * Reads the server settings from environment variables.
 * Throws a ZodError when a variable is present but unusable.
 */
export function loadConfig(env: ServerEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    stateFile: parsed.STATE_FILE,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL
  };
}
