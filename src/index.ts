/**
 * Hi-Rez API client
 *
 * Signed, session-managed access to the Smite and Paladins statistics API.
 */

export {
  HirezClient,
  withClient,
  isSessionRejected,
  type ClientOptions,
  type CallOptions,
  type MethodArg,
} from './client.js';

export {
  SessionManager,
  CREATE_SESSION_METHOD,
  DEFAULT_SESSION_TTL_MS,
  type Session,
  type SignedRequest,
  type SessionRequester,
  type SessionManagerOptions,
} from './auth/session.js';

export { createSignature, formatTimestamp, type Credentials } from './auth/signature.js';

export {
  PLATFORMS,
  PLATFORM_BASE_URLS,
  DEFAULT_PLATFORM,
  getBaseUrl,
  type Platform,
} from './config/platforms.js';

export { loadConfig, type Env } from './config/env.js';

export {
  ApiError,
  ApiErrorCode,
  SessionCreationError,
  SignatureInputError,
  isApiError,
  formatApiError,
  type ApiErrorOptions,
} from './errors.js';

export {
  getJson,
  getText,
  request,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  type FetchFn,
} from './transport/http.js';

export { logger } from './utils/logger.js';
