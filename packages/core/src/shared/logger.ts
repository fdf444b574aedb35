import pino from 'pino';

const redactPaths = [
  'EXCHANGE_API_KEY',
  'EXCHANGE_API_SECRET',
  'EXCHANGE_API_PASSPHRASE',
  'apiKey',
  'apiSecret',
  'passphrase',
  'signature',
  'authorization',
  '*.EXCHANGE_API_KEY',
  '*.EXCHANGE_API_SECRET',
  '*.EXCHANGE_API_PASSPHRASE',
  '*.apiKey',
  '*.apiSecret',
  '*.passphrase',
  '*.signature',
  '*.authorization',
  'headers["CB-ACCESS-KEY"]',
  'headers["CB-ACCESS-SIGN"]',
  'headers["CB-ACCESS-PASSPHRASE"]',
];

export type Logger = pino.Logger;

// Module loggers are created at import time, before configuration is loaded
let configuredLevel: string | null = null;
const followers = new Set<pino.Logger>();

export function createLogger(name: string, options?: { destination?: pino.DestinationStream; level?: string }): pino.Logger {
  const logger = pino({
    name,
    level: options?.level ?? configuredLevel ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  }, options?.destination);
  if (options?.level === undefined) {
    followers.add(logger);
  }
  return logger;
}

/**
 * Apply the configured level to every logger created without an explicit
 * one, including those created later.
 */
export function setLogLevel(level: string): void {
  configuredLevel = level;
  for (const logger of followers) {
    logger.level = level;
  }
}

/**
 * Strip query string from a URL for safe logging.
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    // If URL parsing fails, strip everything after ?
    const qIndex = url.indexOf('?');
    return qIndex >= 0 ? url.substring(0, qIndex) : url;
  }
}
