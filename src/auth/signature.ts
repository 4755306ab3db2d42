/**
 * Request Signature
 *
 * Every Hi-Rez call carries an MD5 digest proving possession of the
 * auth key without sending it:
 *
 *   md5(devId + methodName + authKey + timestamp), lowercase hex
 *
 * The timestamp is the UTC instant of the request as `yyyyMMddHHmmss`.
 */

import * as crypto from 'crypto';

export interface Credentials {
  readonly devId: string;
  readonly authKey: string;
}

/**
 * Compute the signature for one request. Pure: any strings, including
 * empty ones, produce a digest. Input checks live in the session manager.
 */
export function createSignature(
  devId: string,
  methodName: string,
  authKey: string,
  timestamp: string,
): string {
  return crypto
    .createHash('md5')
    .update(`${devId}${methodName}${authKey}${timestamp}`, 'utf-8')
    .digest('hex');
}

/**
 * Format a Date as the UTC `yyyyMMddHHmmss` timestamp the API expects.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return (
    date.getUTCFullYear().toString().padStart(4, '0') +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}
