import { createHmac } from 'node:crypto';
import type { ExchangeCredentials } from '@ordercraft/core';

/**
 * Sign a request: base64 HMAC-SHA256 of timestamp + method + path + body,
 * keyed with the base64-decoded API secret.
 */
export function signRequest(
  secret: string,
  timestamp: string,
  method: string,
  requestPath: string,
  body = '',
): string {
  const key = Buffer.from(secret, 'base64');
  return createHmac('sha256', key)
    .update(timestamp + method.toUpperCase() + requestPath + body)
    .digest('base64');
}

/** Seconds since the epoch, as the exchange expects it. */
export function currentTimestamp(now: number = Date.now()): string {
  return (now / 1000).toString();
}

/**
 * Build authentication headers for a REST request.
 */
export function buildAuthHeaders(
  credentials: ExchangeCredentials,
  method: string,
  requestPath: string,
  body = '',
  timestamp: string = currentTimestamp(),
): Record<string, string> {
  return {
    'CB-ACCESS-KEY': credentials.apiKey,
    'CB-ACCESS-SIGN': signRequest(credentials.apiSecret, timestamp, method, requestPath, body),
    'CB-ACCESS-TIMESTAMP': timestamp,
    'CB-ACCESS-PASSPHRASE': credentials.passphrase,
    'Content-Type': 'application/json',
  };
}
