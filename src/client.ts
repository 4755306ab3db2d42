/**
 * Hi-Rez API Client
 *
 * Long-lived handle that owns the credentials, the session manager and
 * the transport settings. Any remote method name can be called; the
 * client signs it, attaches the current session and fetches:
 *
 *   {baseUrl}/{method}json/{devId}/{signature}/{sessionId}/{timestamp}/{arg...}
 *
 * Usage:
 *   const players = await withClient(loadConfig(), (api) =>
 *     api.callMethodList('getplayer', ['SomePlayer']),
 *   );
 */

import { z } from 'zod';
import {
  CREATE_SESSION_METHOD,
  SessionManager,
  type Session,
  type SignedRequest,
} from './auth/session.js';
import { getBaseUrl, PLATFORMS, type Platform } from './config/platforms.js';
import { ApiError, ApiErrorCode } from './errors.js';
import { getJson, getText, MAX_TIMEOUT_MS, type FetchFn, type GetOptions } from './transport/http.js';
import { createChildLogger, withTiming } from './utils/logger.js';

// ─── Types ──────────────────────────────────────────────

export type MethodArg = string | number;

export interface ClientOptions {
  devId: string;
  authKey: string;
  /** Ignored when baseUrl is given */
  platform?: Platform;
  baseUrl?: string;
  sessionTtlMs?: number;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  now?: () => Date;
}

export interface CallOptions {
  /** Abandons this call only; a shared session creation keeps running */
  signal?: AbortSignal;
}

const clientOptionsSchema = z.object({
  devId: z.string().min(1, 'devId is required'),
  authKey: z.string().min(1, 'authKey is required'),
  platform: z.enum(PLATFORMS).optional(),
  baseUrl: z.string().url().optional(),
  sessionTtlMs: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
});

const retMsgSchema = z.object({ ret_msg: z.string().nullish() });

const INVALID_SESSION_PATTERN = /invalid session id/i;

const log = createChildLogger({ component: 'client' });

// ─── Client ─────────────────────────────────────────────

export class HirezClient {
  readonly baseUrl: string;
  readonly sessions: SessionManager;

  private readonly devId: string;
  private readonly timeoutMs?: number;
  private readonly fetchFn?: FetchFn;
  private readonly lifetime = new AbortController();
  private closed = false;

  constructor(options: ClientOptions) {
    const parsed = clientOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ApiError(ApiErrorCode.INVALID_CONFIG, 'Invalid client options', {
        context: {
          issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        },
      });
    }

    const config = parsed.data;
    this.devId = config.devId;
    this.baseUrl = (config.baseUrl ?? getBaseUrl(config.platform)).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = options.fetchFn;

    this.sessions = new SessionManager({
      credentials: { devId: config.devId, authKey: config.authKey },
      ttlMs: config.sessionTtlMs,
      now: options.now,
      signal: this.lifetime.signal,
      requestSession: (request, signal) =>
        getJson(this.buildUrl(request), this.transportOptions(signal)),
    });
  }

  // ─── Calls ────────────────────────────────────────────

  /**
   * Call any remote method. Creates or renews the session as needed.
   */
  async callMethod(
    method: string,
    args: readonly MethodArg[] = [],
    options: CallOptions = {},
  ): Promise<unknown> {
    this.assertOpen();
    const { result } = await withTiming(method, { baseUrl: this.baseUrl }, () =>
      this.invoke(method, args, options.signal),
    );
    return result;
  }

  /**
   * callMethod, asserting the result is a JSON object.
   */
  async callMethodObject(
    method: string,
    args: readonly MethodArg[] = [],
    options?: CallOptions,
  ): Promise<Record<string, unknown>> {
    const result = await this.callMethod(method, args, options);
    if (!isRecord(result)) {
      throw unexpectedShape(method, 'object', result);
    }
    return result;
  }

  /**
   * callMethod, asserting the result is a JSON array.
   */
  async callMethodList(
    method: string,
    args: readonly MethodArg[] = [],
    options?: CallOptions,
  ): Promise<unknown[]> {
    const result = await this.callMethod(method, args, options);
    if (!Array.isArray(result)) {
      throw unexpectedShape(method, 'array', result);
    }
    return result;
  }

  /**
   * Unsigned health check; returns the raw version/date string.
   */
  async ping(options: CallOptions = {}): Promise<string> {
    this.assertOpen();
    const { result } = await withTiming('ping', { baseUrl: this.baseUrl }, () =>
      getText(`${this.baseUrl}/pingjson`, this.transportOptions(options.signal)),
    );
    return result;
  }

  /**
   * Force a fresh session, replacing the current one.
   */
  async createSession(options: CallOptions = {}): Promise<Session> {
    this.assertOpen();
    return this.sessions.renew(options.signal);
  }

  // ─── URL building ─────────────────────────────────────

  /**
   * Compose the request URL from a signed request and its arguments.
   */
  buildUrl(request: SignedRequest, args: readonly MethodArg[] = []): string {
    const segments = [`${request.method}json`, this.devId, request.signature];
    if (request.method !== CREATE_SESSION_METHOD) {
      if (!request.sessionId) {
        throw new ApiError(ApiErrorCode.SESSION_REJECTED, `No session for ${request.method}`);
      }
      segments.push(request.sessionId);
    }
    segments.push(request.timestamp);
    for (const arg of args) {
      segments.push(encodeURIComponent(String(arg)));
    }
    return `${this.baseUrl}/${segments.join('/')}`;
  }

  // ─── Lifecycle ────────────────────────────────────────

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Release the client: in-flight requests are aborted and later calls
   * fail with CLIENT_CLOSED. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.lifetime.abort(new ApiError(ApiErrorCode.CLIENT_CLOSED, 'Client was closed'));
    log.debug({ baseUrl: this.baseUrl }, 'Client closed');
  }

  // ─── Internal ─────────────────────────────────────────

  private async invoke(
    method: string,
    args: readonly MethodArg[],
    signal?: AbortSignal,
  ): Promise<unknown> {
    const signed = await this.sessions.sign(method, signal);
    const body = await getJson(this.buildUrl(signed, args), this.transportOptions(signal));
    if (!isSessionRejected(body)) return body;

    // Server-side expiry can precede ours; renew once and retry.
    log.info({ method }, 'Session rejected by server, renewing');
    this.sessions.invalidate(signed.sessionId);

    const retry = await this.sessions.sign(method, signal);
    const retryBody = await getJson(this.buildUrl(retry, args), this.transportOptions(signal));
    if (isSessionRejected(retryBody)) {
      throw new ApiError(ApiErrorCode.SESSION_REJECTED, `Session rejected twice for ${method}`, {
        suggestion: 'The session may have been revoked; try again later.',
      });
    }
    return retryBody;
  }

  private transportOptions(signal?: AbortSignal): GetOptions {
    return {
      fetchFn: this.fetchFn,
      timeoutMs: this.timeoutMs,
      lifetime: this.lifetime.signal,
      signal,
    };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ApiError(ApiErrorCode.CLIENT_CLOSED, 'Client was closed');
    }
  }
}

// ─── Scoped use ─────────────────────────────────────────

/**
 * Create a client, run `fn`, and close the client on every exit path.
 */
export async function withClient<T>(
  options: ClientOptions,
  fn: (client: HirezClient) => Promise<T>,
): Promise<T> {
  const client = new HirezClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

// ─── Helpers ────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when the body (or any element of it) reports an invalid session.
 */
export function isSessionRejected(body: unknown): boolean {
  const items = Array.isArray(body) ? body : [body];
  return items.some((item) => {
    const parsed = retMsgSchema.safeParse(item);
    return parsed.success && INVALID_SESSION_PATTERN.test(parsed.data.ret_msg ?? '');
  });
}

function unexpectedShape(method: string, expected: string, value: unknown): ApiError {
  const received = Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
  return new ApiError(
    ApiErrorCode.UNEXPECTED_RESPONSE,
    `Expected ${expected} from ${method}, received ${received}`,
    { context: { method } },
  );
}
