/**
 * Hi-Rez Client Error Types
 *
 * Every failure raised by this library is an ApiError with a stable code.
 * Callers branch on `code`; the CLI renders errors with formatApiError.
 * Network errors thrown by fetch itself are not wrapped.
 */

export enum ApiErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_SIGNATURE_INPUT = 'INVALID_SIGNATURE_INPUT',
  SESSION_CREATION_FAILED = 'SESSION_CREATION_FAILED',
  SESSION_REJECTED = 'SESSION_REJECTED',
  HTTP_ERROR = 'HTTP_ERROR',
  TIMEOUT = 'TIMEOUT',
  UNEXPECTED_RESPONSE = 'UNEXPECTED_RESPONSE',
  CLIENT_CLOSED = 'CLIENT_CLOSED',
}

export interface ApiErrorOptions {
  suggestion?: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class ApiError extends Error {
  public readonly code: ApiErrorCode;
  public readonly suggestion?: string;
  public readonly context?: Record<string, unknown>;

  constructor(code: ApiErrorCode, message: string, options: ApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.code = code;
    this.suggestion = options.suggestion;
    this.context = options.context;
  }
}

/**
 * The remote `createsession` call failed: transport error, non-success
 * status, or a response without a session id.
 */
export class SessionCreationError extends ApiError {
  constructor(message: string, options: ApiErrorOptions = {}) {
    super(ApiErrorCode.SESSION_CREATION_FAILED, message, {
      suggestion: 'Check HIREZ_DEV_ID / HIREZ_AUTH_KEY and the daily session quota.',
      ...options,
    });
    this.name = 'SessionCreationError';
  }
}

/**
 * Signing was attempted with an empty credential, method name or timestamp.
 */
export class SignatureInputError extends ApiError {
  constructor(field: string) {
    super(ApiErrorCode.INVALID_SIGNATURE_INPUT, `Cannot sign request: ${field} is empty`, {
      context: { field },
    });
    this.name = 'SignatureInputError';
  }
}

export function isApiError(error: unknown, code?: ApiErrorCode): error is ApiError {
  return error instanceof ApiError && (code === undefined || error.code === code);
}

/**
 * Format an error for terminal output
 */
export function formatApiError(error: unknown): string {
  if (!(error instanceof ApiError)) {
    return `✗ ${error instanceof Error ? error.message : String(error)}`;
  }
  let text = `✗ [${error.code}] ${error.message}`;
  if (error.suggestion) text += `\n\n→ ${error.suggestion}`;
  if (error.context) text += `\n\n${JSON.stringify(error.context, null, 2)}`;
  return text;
}
