/**
 * Session Manager
 *
 * Every Hi-Rez method except ping needs a session id obtained from the
 * signed `createsession` method. Sessions are only valid for a limited
 * window, so this module tracks expiry locally and renews lazily.
 *
 * Lifecycle:
 * 1. First call → `createsession` (signed), session installed
 * 2. Calls within the window → reuse the installed session
 * 3. After the window (or when the server rejects the id) → renew on next call
 *
 * Creation is single-flight: concurrent callers that find no live session
 * all await the same in-flight promise instead of issuing their own request.
 */

import { z } from 'zod';
import { SessionCreationError, SignatureInputError } from '../errors.js';
import { abortable } from '../utils/abort.js';
import { createChildLogger } from '../utils/logger.js';
import { createSignature, formatTimestamp, type Credentials } from './signature.js';

// ─── Types ──────────────────────────────────────────────

export interface Session {
  /** Opaque id returned by `createsession` */
  readonly id: string;
  readonly createdAt: Date;
  readonly expiresAt: Date;
}

/**
 * Everything the transport needs to build a signed request path.
 * `sessionId` is absent only for `createsession` itself.
 */
export interface SignedRequest {
  method: string;
  signature: string;
  timestamp: string;
  sessionId?: string;
}

/**
 * Sends the signed `createsession` request and returns the parsed JSON body.
 */
export type SessionRequester = (request: SignedRequest, signal?: AbortSignal) => Promise<unknown>;

export interface SessionManagerOptions {
  credentials: Credentials;
  requestSession: SessionRequester;
  /** Validity window of a session; defaults to 15 minutes */
  ttlMs?: number;
  /** Clock, replaceable in tests */
  now?: () => Date;
  /** Aborts a pending creation when the owning client is released */
  signal?: AbortSignal;
}

// ─── Constants ──────────────────────────────────────────

export const CREATE_SESSION_METHOD = 'createsession';
export const DEFAULT_SESSION_TTL_MS = 15 * 60 * 1000;

const createSessionResponseSchema = z.object({
  ret_msg: z.string().nullish(),
  session_id: z.string().nullish(),
  timestamp: z.string().nullish(),
});

const log = createChildLogger({ component: 'session' });

// ─── Session Manager ────────────────────────────────────

export class SessionManager {
  private readonly credentials: Credentials;
  private readonly requestSession: SessionRequester;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private readonly signal?: AbortSignal;

  private session: Session | null = null;
  private pending: Promise<Session> | null = null;
  private creations = 0;

  constructor(options: SessionManagerOptions) {
    this.credentials = options.credentials;
    this.requestSession = options.requestSession;
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? (() => new Date());
    this.signal = options.signal;
  }

  /**
   * The live session, or null when none exists or it has expired.
   */
  current(): Session | null {
    if (!this.session) return null;
    if (this.session.expiresAt.getTime() <= this.now().getTime()) return null;
    return this.session;
  }

  /** Number of `createsession` requests issued so far */
  get creationCount(): number {
    return this.creations;
  }

  /**
   * Return the live session, creating one if needed.
   *
   * `signal` only abandons this caller's wait; a creation other callers
   * depend on keeps running.
   */
  async ensureSession(signal?: AbortSignal): Promise<Session> {
    const live = this.current();
    if (live) return live;
    return abortable(this.startCreation(), signal);
  }

  /**
   * Ensure a session, then sign `method` with a fresh timestamp.
   */
  async sign(method: string, signal?: AbortSignal): Promise<Required<SignedRequest>> {
    if (!method) throw new SignatureInputError('method name');
    const session = await this.ensureSession(signal);
    const request = this.signRequest(method, formatTimestamp(this.now()));
    return { ...request, sessionId: session.id };
  }

  /**
   * Sign a request without touching session state. Empty inputs are
   * rejected here so they never reach the wire.
   */
  signRequest(method: string, timestamp: string): SignedRequest {
    const { devId, authKey } = this.credentials;
    if (!devId) throw new SignatureInputError('devId');
    if (!authKey) throw new SignatureInputError('authKey');
    if (!method) throw new SignatureInputError('method name');
    if (!timestamp) throw new SignatureInputError('timestamp');

    return {
      method,
      signature: createSignature(devId, method, authKey, timestamp),
      timestamp,
    };
  }

  /**
   * Force a new session, joining a creation already in flight.
   */
  async renew(signal?: AbortSignal): Promise<Session> {
    if (!this.pending) this.session = null;
    return abortable(this.startCreation(), signal);
  }

  /**
   * Drop the current session. With `sessionId`, only if it is still the
   * installed one, so a stale rejection cannot discard a newer session.
   */
  invalidate(sessionId?: string): void {
    if (!this.session) return;
    if (sessionId !== undefined && this.session.id !== sessionId) return;
    log.info({ sessionId: this.session.id }, 'Session invalidated');
    this.session = null;
  }

  // ─── Internal ─────────────────────────────────────────

  private startCreation(): Promise<Session> {
    if (!this.pending) {
      this.pending = this.createSession().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async createSession(): Promise<Session> {
    const startedAt = this.now();
    const request = this.signRequest(CREATE_SESSION_METHOD, formatTimestamp(startedAt));
    this.creations++;
    log.debug({ attempt: this.creations }, 'Creating session');

    let body: unknown;
    try {
      body = await this.requestSession(request, this.signal);
    } catch (error) {
      this.session = null;
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ error: message }, 'Session creation request failed');
      throw new SessionCreationError(`Session creation failed: ${message}`, { cause: error });
    }

    const parsed = createSessionResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.session = null;
      log.warn('Session creation returned an unexpected body');
      throw new SessionCreationError('Session creation returned an unexpected response', {
        context: { issues: parsed.error.issues.map((i) => i.message) },
      });
    }

    const { session_id: id, ret_msg: retMsg } = parsed.data;
    if (!id) {
      this.session = null;
      log.warn({ retMsg }, 'Session creation refused');
      throw new SessionCreationError(
        `Session creation refused: ${retMsg ?? 'no session_id in response'}`,
        { context: retMsg ? { ret_msg: retMsg } : undefined },
      );
    }

    const session: Session = {
      id,
      createdAt: startedAt,
      expiresAt: new Date(startedAt.getTime() + this.ttlMs),
    };
    this.session = session;
    log.info({ sessionId: id, expiresAt: session.expiresAt.toISOString() }, 'Session created');
    return session;
  }
}
