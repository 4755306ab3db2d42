/**
 * HTTP Transport
 *
 * Thin GET layer over fetch. Adds a per-request timeout, merges the
 * caller's and the client's abort signals, and turns non-2xx statuses
 * into ApiError. Network failures from fetch propagate unchanged.
 */

import { ApiError, ApiErrorCode } from '../errors.js';
import { abortable, linkSignals } from '../utils/abort.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface GetOptions {
  /** Defaults to the global fetch, resolved at call time */
  fetchFn?: FetchFn;
  timeoutMs?: number;
  /** Caller's signal */
  signal?: AbortSignal;
  /** Owner's signal (aborted when the client is closed) */
  lifetime?: AbortSignal;
}

export const DEFAULT_TIMEOUT_MS = 10_000;
/** Largest delay setTimeout honours; longer ones fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Issue a GET, check the status, then read the body with `read`.
 *
 * The timeout, the caller's signal and the owner's signal stay armed until
 * `read` settles, so a stalled body is aborted like a stalled connect.
 */
export async function request<T>(
  url: string,
  options: GetOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const linked = linkSignals([options.lifetime, options.signal], {
    ms: timeoutMs,
    reason: () =>
      new ApiError(ApiErrorCode.TIMEOUT, `Request timed out after ${timeoutMs}ms`, {
        context: { url: redactUrl(url) },
      }),
  });

  try {
    const fetchFn = options.fetchFn ?? fetch;
    const response = await fetchFn(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: linked.signal,
    });

    if (!response.ok) {
      throw new ApiError(ApiErrorCode.HTTP_ERROR, `Request failed: ${response.status}`, {
        context: { status: response.status, url: redactUrl(url) },
      });
    }
    return await abortable(read(response), linked.signal);
  } finally {
    linked.dispose();
  }
}

export async function getJson(url: string, options: GetOptions = {}): Promise<unknown> {
  const text = await request(url, options, (response) => response.text());
  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch (error) {
    // JSON.parse only throws SyntaxError; read errors propagated above
    throw new ApiError(ApiErrorCode.UNEXPECTED_RESPONSE, 'Response body is not valid JSON', {
      cause: error,
      context: { url: redactUrl(url) },
    });
  }
}

export async function getText(url: string, options: GetOptions = {}): Promise<string> {
  return request(url, options, (response) => response.text());
}

/**
 * Keep the method segment of a signed URL and drop everything after it
 * (dev id, signature, session id) before it reaches logs or errors.
 */
export function redactUrl(url: string): string {
  const match = /^(.*?\/[a-z0-9_]+json)(\/.*)?$/i.exec(url);
  if (!match) return url;
  return match[2] ? `${match[1]}/…` : match[1];
}
