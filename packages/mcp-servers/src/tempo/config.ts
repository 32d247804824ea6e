/**
 * Tempo server configuration, read from the environment.
 *
 * Required env vars:
 * - TEMPO_API_TOKEN: Tempo API token (bearer auth)
 *
 * Optional env vars:
 * - TEMPO_BASE_URL: API root (default: https://api.tempo.io/4)
 * - TEMPO_DEBUG: enable debug logging (1/true/yes/on)
 * - TEMPO_RATE_LIMIT: outbound requests per second (default: 5)
 * - TEMPO_TIMEOUT_SECONDS: per-request timeout (default: 30)
 * - TEMPO_MAX_ATTEMPTS: attempts per call including the first (default: 3)
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 */

import { z } from 'zod';
import { ConfigurationError } from '../shared/errors.js';
import type { LogLevel } from '../shared/logger.js';

export const DEFAULT_BASE_URL = 'https://api.tempo.io/4';

export interface TempoConfig {
  apiToken: string;
  baseUrl: string;
  debug: boolean;
  rateLimitPerSecond: number;
  timeoutMs: number;
  maxAttempts: number;
  logLevel: LogLevel;
}

const FLAG_VALUES = ['1', 'true', 'yes', 'on'];

/** Treat empty strings as unset so `FOO=` falls back to the default */
const unsetIfEmpty = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  TEMPO_API_TOKEN: z.preprocess(
    unsetIfEmpty,
    z.string({ required_error: 'TEMPO_API_TOKEN environment variable is required' }).trim().min(1),
  ),
  TEMPO_BASE_URL: z.preprocess(unsetIfEmpty, z.string().url().default(DEFAULT_BASE_URL)),
  TEMPO_DEBUG: z.preprocess(
    unsetIfEmpty,
    z.string().optional().transform((value) => value !== undefined && FLAG_VALUES.includes(value.toLowerCase())),
  ),
  TEMPO_RATE_LIMIT: z.preprocess(unsetIfEmpty, z.coerce.number().positive().finite().default(5)),
  TEMPO_TIMEOUT_SECONDS: z.preprocess(unsetIfEmpty, z.coerce.number().positive().finite().default(30)),
  TEMPO_MAX_ATTEMPTS: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(1).max(10).default(3)),
  LOG_LEVEL: z.preprocess(unsetIfEmpty, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
});

/**
 * Parse configuration from an environment map.
 * @throws {ConfigurationError} Listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TempoConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  return {
    apiToken: data.TEMPO_API_TOKEN,
    baseUrl: data.TEMPO_BASE_URL.replace(/\/+$/, ''),
    debug: data.TEMPO_DEBUG,
    rateLimitPerSecond: data.TEMPO_RATE_LIMIT,
    timeoutMs: Math.round(data.TEMPO_TIMEOUT_SECONDS * 1000),
    maxAttempts: data.TEMPO_MAX_ATTEMPTS,
    logLevel: data.TEMPO_DEBUG ? 'debug' : data.LOG_LEVEL,
  };
}
