import { z } from 'zod';
import * as dotenv from 'dotenv';
import { createLogger } from './logger.js';

const logger = createLogger('config');

const booleanFlag = z.preprocess(
  (val) => val === 'true' || val === true,
  z.boolean().default(false),
);

const credentialsSchema = z.object({
  EXCHANGE_API_KEY: z.string().min(1),
  EXCHANGE_API_SECRET: z.string().min(1),
  EXCHANGE_API_PASSPHRASE: z.string().min(1),
});

const CREDENTIAL_KEYS = Object.keys(credentialsSchema.shape);

const configSchema = z.object({
  EXCHANGE_API_URL: z.string().url().default('https://api.exchange.coinbase.com'),
  EXCHANGE_WS_URL: z.string().url().default('wss://ws-feed.exchange.coinbase.com'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  STRATEGY_CONFIG_PATH: z.string().optional(),
  SIMULATE_ORDERS: booleanFlag,
  CANCEL_ON_SHUTDOWN: booleanFlag,
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(5),
  RATE_LIMIT_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  AUDIT_RETENTION_MS: z.coerce.number().int().nonnegative().default(3_600_000),
  RESOLVE_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
});

export interface ExchangeCredentials {
  apiKey: string;
  apiSecret: string;
  passphrase: string;
}

export interface RateLimitConfig {
  maxRequests: number;
  intervalMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface EngineConfig {
  apiUrl: string;
  wsUrl: string;
  credentials?: ExchangeCredentials;
  logLevel: string;
  strategyConfigPath?: string;
  simulateOrders: boolean;
  cancelOnShutdown: boolean;
  rateLimit: RateLimitConfig;
  retry: RetryConfig;
  requestTimeoutMs: number;
  auditRetentionMs: number;
  resolveIntervalMs: number;
}

function parseCredentials(env: Record<string, string | undefined>): ExchangeCredentials | undefined {
  const result = credentialsSchema.safeParse(env);
  if (result.success) {
    return {
      apiKey: result.data.EXCHANGE_API_KEY,
      apiSecret: result.data.EXCHANGE_API_SECRET,
      passphrase: result.data.EXCHANGE_API_PASSPHRASE,
    };
  }
  // Only warn when the block is partially filled in
  const hasAny = CREDENTIAL_KEYS.some((k) => env[k] !== undefined && env[k] !== '');
  if (hasAny) {
    logger.warn({ missing: result.error.issues.map((i) => i.path.join('.')) },
      'Exchange credentials ignored: incomplete credential block');
  }
  return undefined;
}

export function loadConfig(envOverrides?: Record<string, string | undefined>): EngineConfig {
  dotenv.config();
  const env = envOverrides ?? process.env;

  const core = configSchema.parse(env);

  return {
    apiUrl: core.EXCHANGE_API_URL,
    wsUrl: core.EXCHANGE_WS_URL,
    credentials: parseCredentials(env),
    logLevel: core.LOG_LEVEL,
    strategyConfigPath: core.STRATEGY_CONFIG_PATH || undefined,
    simulateOrders: core.SIMULATE_ORDERS,
    cancelOnShutdown: core.CANCEL_ON_SHUTDOWN,
    rateLimit: {
      maxRequests: core.RATE_LIMIT_MAX_REQUESTS,
      intervalMs: core.RATE_LIMIT_INTERVAL_MS,
    },
    retry: {
      maxAttempts: core.RETRY_MAX_ATTEMPTS,
      baseDelayMs: core.RETRY_BASE_DELAY_MS,
      maxDelayMs: core.RETRY_MAX_DELAY_MS,
    },
    requestTimeoutMs: core.REQUEST_TIMEOUT_MS,
    auditRetentionMs: core.AUDIT_RETENTION_MS,
    resolveIntervalMs: core.RESOLVE_INTERVAL_MS,
  };
}
