/**
 * Shared test fixtures: credentials, a fixed clock and a fake Hi-Rez API
 * behind an injectable fetch.
 */

import { vi } from 'vitest';

export const DEV_ID = '1234';
export const AUTH_KEY = 'abcd';
export const BASE_URL = 'https://api.example.test/smiteapi.svc';

/** md5("1234createsessionabcd20230101120000") */
export const CREATE_SESSION_SIGNATURE = 'e1ee1abc7e6b960ba5254c2f0236499d';
/** md5("1234getplayerabcd20230101120000") */
export const GETPLAYER_SIGNATURE = '3291239350a7003bcab0f3286396127b';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Mutable clock starting at 2023-01-01T12:00:00Z.
 */
export function makeClock() {
  let current = new Date(Date.UTC(2023, 0, 1, 12, 0, 0));
  return {
    now: () => current,
    advance: (ms: number) => {
      current = new Date(current.getTime() + ms);
    },
  };
}

export interface FakeApiOptions {
  /** Session ids handed out by successive createsession calls */
  sessionIds?: string[];
  /** Body for regular method calls; receives the request URL */
  methodBody?: (url: string) => unknown;
}

/**
 * Fake API: createsession returns the next configured session id,
 * every other method returns `methodBody(url)`.
 */
export function makeFakeApi(options: FakeApiOptions = {}) {
  const sessionIds = options.sessionIds ?? ['S1', 'S2', 'S3'];
  const methodBody = options.methodBody ?? (() => [{ ret_msg: null, Name: 'TestPlayer' }]);
  let created = 0;

  const fetchFn = vi.fn(async (url: string, _init?: RequestInit): Promise<Response> => {
    if (url.includes('/createsessionjson/')) {
      const id = sessionIds[Math.min(created, sessionIds.length - 1)];
      created++;
      return jsonResponse({ ret_msg: 'Approved', session_id: id, timestamp: '1/1/2023 12:00:00 PM' });
    }
    return jsonResponse(methodBody(url));
  });

  const urls = () => fetchFn.mock.calls.map((call) => call[0]);

  return {
    fetchFn,
    urls,
    createSessionCalls: () => urls().filter((u) => u.includes('/createsessionjson/')).length,
    methodUrls: () => urls().filter((u) => !u.includes('/createsessionjson/')),
  };
}

/**
 * A promise whose settlement is controlled by the test.
 */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * fetch that never answers and rejects with the abort reason.
 */
export function hangingFetch() {
  return vi.fn(
    (_url: string, init?: RequestInit): Promise<Response> =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      }),
  );
}

/**
 * fetch whose response headers arrive at once but whose body never
 * finishes. The init passed to each call is kept for inspection.
 */
export function stalledBodyFetch() {
  return vi.fn(
    async (_url: string, _init?: RequestInit): Promise<Response> =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('{"ret_msg":'));
          },
        }),
      ),
  );
}
