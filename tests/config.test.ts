/**
 * Tests for config/env.ts and config/platforms.ts
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config/env.js';
import { getBaseUrl, PLATFORM_BASE_URLS, PLATFORMS } from '../src/config/platforms.js';
import { ApiError, ApiErrorCode } from '../src/errors.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({ HIREZ_DEV_ID: '1234', HIREZ_AUTH_KEY: 'test-secret' })).toEqual({
      devId: '1234',
      authKey: 'test-secret',
      platform: 'smite-pc',
      baseUrl: undefined,
      sessionTtlMs: 15 * 60 * 1000,
      timeoutMs: 10_000,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      HIREZ_DEV_ID: '1234',
      HIREZ_AUTH_KEY: 'test-secret',
      HIREZ_PLATFORM: 'paladins-ps4',
      HIREZ_BASE_URL: 'https://api.example.test/paladinsapi.svc',
      HIREZ_SESSION_TTL_MINUTES: '14.5',
      HIREZ_TIMEOUT_MS: '2500',
    });

    expect(config).toEqual({
      devId: '1234',
      authKey: 'test-secret',
      platform: 'paladins-ps4',
      baseUrl: 'https://api.example.test/paladinsapi.svc',
      sessionTtlMs: 870_000,
      timeoutMs: 2500,
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({
      HIREZ_DEV_ID: '1234',
      HIREZ_AUTH_KEY: 'test-secret',
      HIREZ_BASE_URL: '',
      HIREZ_PLATFORM: '',
    });
    expect(config.baseUrl).toBeUndefined();
    expect(config.platform).toBe('smite-pc');
  });

  it('ignores unrelated variables', () => {
    const config = loadConfig({
      HIREZ_DEV_ID: '1234',
      HIREZ_AUTH_KEY: 'test-secret',
      PATH: '/usr/bin',
    });
    expect(config.devId).toBe('1234');
  });

  it('lists every missing credential', () => {
    const error = captureError(() => loadConfig({}));

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      code: ApiErrorCode.INVALID_CONFIG,
      context: { issues: ['HIREZ_DEV_ID: Required', 'HIREZ_AUTH_KEY: Required'] },
    });
  });

  it('rejects an unknown platform', () => {
    const error = captureError(() =>
      loadConfig({ HIREZ_DEV_ID: '1', HIREZ_AUTH_KEY: 'k', HIREZ_PLATFORM: 'smite-switch' }),
    );
    expect(error).toMatchObject({ code: ApiErrorCode.INVALID_CONFIG });
  });

  it('rejects a non-numeric timeout', () => {
    const error = captureError(() =>
      loadConfig({ HIREZ_DEV_ID: '1', HIREZ_AUTH_KEY: 'k', HIREZ_TIMEOUT_MS: 'soon' }),
    );
    expect(error).toMatchObject({ code: ApiErrorCode.INVALID_CONFIG });
  });

  it('accepts the largest timer delay as timeout', () => {
    const config = loadConfig({
      HIREZ_DEV_ID: '1',
      HIREZ_AUTH_KEY: 'k',
      HIREZ_TIMEOUT_MS: '2147483647',
    });
    expect(config.timeoutMs).toBe(2_147_483_647);
  });

  it('rejects a timeout a timer cannot hold', () => {
    const error = captureError(() =>
      loadConfig({ HIREZ_DEV_ID: '1', HIREZ_AUTH_KEY: 'k', HIREZ_TIMEOUT_MS: '2147483648' }),
    );
    expect(error).toMatchObject({ code: ApiErrorCode.INVALID_CONFIG });
  });

  it('rejects a session TTL that rounds to zero milliseconds', () => {
    const error = captureError(() =>
      loadConfig({ HIREZ_DEV_ID: '1', HIREZ_AUTH_KEY: 'k', HIREZ_SESSION_TTL_MINUTES: '0.000001' }),
    );
    expect(error).toMatchObject({
      code: ApiErrorCode.INVALID_CONFIG,
      context: { issues: ['HIREZ_SESSION_TTL_MINUTES: Session TTL must be at least 1ms'] },
    });
  });

  it('keeps a sub-minute TTL that rounds to at least 1ms', () => {
    const config = loadConfig({
      HIREZ_DEV_ID: '1',
      HIREZ_AUTH_KEY: 'k',
      HIREZ_SESSION_TTL_MINUTES: '0.0001',
    });
    expect(config.sessionTtlMs).toBe(6);
  });
});

describe('platforms', () => {
  it('has an endpoint for every platform', () => {
    for (const platform of PLATFORMS) {
      expect(PLATFORM_BASE_URLS[platform]).toMatch(/^https:\/\/api\./);
    }
  });

  it('defaults to Smite PC', () => {
    expect(getBaseUrl()).toBe('https://api.smitegame.com/smiteapi.svc');
    expect(getBaseUrl('paladins-pc')).toBe('https://api.paladins.com/paladinsapi.svc');
  });
});
