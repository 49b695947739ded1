/**
 * config.ts — Environment configuration for the CLI.
 *
 *   MAAS_API_URL      server URL, with or without /api/X.Y/ (required)
 *   MAAS_API_KEY      consumer-key:token-key:token-secret; empty = anonymous
 *   MAAS_API_VERSION  pin a version such as 2.0 instead of negotiating
 *   MAAS_MAX_RETRIES  retries on 503 after the first attempt (default 4)
 *   MAAS_TIMEOUT_MS   per-request timeout (default 30000)
 *   LOG_LEVEL         debug | info | warn | error | silent (default info)
 */

import { z } from 'zod';
import { ConfigError } from './client/errors.js';
import { DEFAULT_MAX_RETRIES } from './client/retry.js';
import { DEFAULT_TIMEOUT_MS } from './client/transport.js';

const EnvSchema = z.object({
  MAAS_API_URL: z.string().url(),
  MAAS_API_KEY: z.string().default(''),
  // an empty value in .env means "not set"
  MAAS_API_VERSION: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().regex(/^\d+\.\d+$/, 'expected the form 2.0').optional(),
  ),
  MAAS_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  MAAS_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface Config {
  apiURL: string;
  apiKey: string;
  apiVersion: string | undefined;
  maxRetries: number;
  timeoutMs: number;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const vars = parsed.data;
  return {
    apiURL: vars.MAAS_API_URL,
    apiKey: vars.MAAS_API_KEY,
    apiVersion: vars.MAAS_API_VERSION,
    maxRetries: vars.MAAS_MAX_RETRIES,
    timeoutMs: vars.MAAS_TIMEOUT_MS,
    logLevel: vars.LOG_LEVEL,
  };
}
