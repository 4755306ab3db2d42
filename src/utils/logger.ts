/**
 * Structured Logging & Observability
 *
 * Provides:
 * - JSON logging via pino (stderr, so CLI output on stdout stays clean)
 * - Timing wrapper for API calls
 *
 * Usage:
 *   import { logger, withTiming } from './utils/logger.js';
 *
 *   const { result } = await withTiming('getplayer', { platform }, () => fetchIt());
 */

import pino, { type Logger } from 'pino';

// ============================================================================
// Logger Configuration
// ============================================================================

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino(
  {
    level: defaultLevel(),
    base: {
      service: 'hirez-session-client',
      version: '0.1.0',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export type { Logger };

interface TimingContext {
  [key: string]: string | number | boolean | undefined;
}

/**
 * Create a child logger with bound context
 */
export function createChildLogger(context: TimingContext): Logger {
  return logger.child(context);
}

// ============================================================================
// Timing Utilities
// ============================================================================

interface TimingResult<T> {
  result: T;
  durationMs: number;
}

/**
 * Execute an async function with timing measurement and logging
 */
export async function withTiming<T>(
  operation: string,
  context: TimingContext,
  fn: () => Promise<T>,
): Promise<TimingResult<T>> {
  const startTime = performance.now();

  try {
    const result = await fn();
    const durationMs = Math.round(performance.now() - startTime);

    logger.debug({ operation, ...context, durationMs, success: true }, `${operation} completed`);

    return { result, durationMs };
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);

    logger.error(
      {
        operation,
        ...context,
        durationMs,
        success: false,
        error: error instanceof Error ? error.message : String(error),
      },
      `${operation} failed`,
    );

    throw error;
  }
}
