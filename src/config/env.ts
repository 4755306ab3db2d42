/**
 * Environment Configuration
 *
 * Reads client options from environment variables. The client itself never
 * looks at the environment; callers (the CLI, applications) pass the
 * result of loadConfig() in explicitly.
 *
 *   HIREZ_DEV_ID              developer id (required)
 *   HIREZ_AUTH_KEY            auth key (required)
 *   HIREZ_PLATFORM            smite-pc | smite-xbox | ... (default smite-pc)
 *   HIREZ_BASE_URL            explicit endpoint, overrides HIREZ_PLATFORM
 *   HIREZ_SESSION_TTL_MINUTES session validity window (default 15)
 *   HIREZ_TIMEOUT_MS          per-request timeout (default 10000)
 */

import { z } from 'zod';
import type { ClientOptions } from '../client.js';
import { ApiError, ApiErrorCode } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from '../transport/http.js';
import { DEFAULT_PLATFORM, PLATFORMS } from './platforms.js';

const envSchema = z.object({
  HIREZ_DEV_ID: z.string().min(1, 'HIREZ_DEV_ID is required'),
  HIREZ_AUTH_KEY: z.string().min(1, 'HIREZ_AUTH_KEY is required'),
  HIREZ_PLATFORM: z.enum(PLATFORMS).default(DEFAULT_PLATFORM),
  HIREZ_BASE_URL: z.string().url().optional(),
  HIREZ_SESSION_TTL_MINUTES: z.coerce
    .number()
    .positive()
    .default(15)
    .transform((minutes) => Math.round(minutes * 60 * 1000))
    .refine((ms) => ms >= 1, 'Session TTL must be at least 1ms'),
  HIREZ_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_TIMEOUT_MS)
    .default(DEFAULT_TIMEOUT_MS),
});

export type Env = Record<string, string | undefined>;

/**
 * Build client options from the environment. Empty strings count as unset.
 */
export function loadConfig(env: Env = process.env): ClientOptions {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('HIREZ_') && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ApiError(ApiErrorCode.INVALID_CONFIG, 'Invalid environment configuration', {
      suggestion: 'Set HIREZ_DEV_ID and HIREZ_AUTH_KEY (see `hirez help`).',
      context: { issues },
    });
  }

  const config = parsed.data;
  return {
    devId: config.HIREZ_DEV_ID,
    authKey: config.HIREZ_AUTH_KEY,
    platform: config.HIREZ_PLATFORM,
    baseUrl: config.HIREZ_BASE_URL,
    sessionTtlMs: config.HIREZ_SESSION_TTL_MINUTES,
    timeoutMs: config.HIREZ_TIMEOUT_MS,
  };
}
