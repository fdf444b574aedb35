import { describe, it, expect, vi } from 'vitest';
import type { EngineConfig } from '../shared/config.js';

// Silence pino logger
vi.mock('pino', () => {
  const noop = () => {};
  const logger: Record<string, unknown> = {
    info: noop,
    warn: noop,
    error: noop,
    debug: noop,
    trace: noop,
    child: () => logger,
  };
  return { default: () => logger };
});

const { describeConfig, describeStrategies, program } = await import('../cli.js');
const { strategyConfigSchema } = await import('../features/strategy/strategy-config.js');

// ============================================================
// Helpers
// ============================================================

function createConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    apiUrl: 'https://api.example.com',
    wsUrl: 'wss://ws.example.com',
    logLevel: 'info',
    simulateOrders: false,
    cancelOnShutdown: true,
    rateLimit: { maxRequests: 5, intervalMs: 1000 },
    retry: { maxAttempts: 4, baseDelayMs: 250, maxDelayMs: 8000 },
    requestTimeoutMs: 10_000,
    auditRetentionMs: 3_600_000,
    resolveIntervalMs: 5000,
    ...overrides,
  };
}

describe('CLI', () => {
  it('registers start, strategies and check-config', () => {
    expect(program.commands.map((c) => c.name())).toEqual(['start', 'strategies', 'check-config']);
  });

  // ============================================================
  // strategies
  // ============================================================

  describe('describeStrategies', () => {
    it('lists strategies and risk limits', () => {
      const config = strategyConfigSchema.parse({
        strategies: [
          { id: 'btc-quoter', type: 'spread_quoter', symbols: ['BTC-USD'], options: { order_size: 0.001, max_position: 0.01 } },
          { id: 'eth-quoter', type: 'spread_quoter', symbols: ['ETH-USD'], enabled: false, options: { order_size: 0.1, max_position: 1 } },
        ],
        risk_limits: {
          max_position_per_symbol: 0.05,
          max_order_notional: 500,
          symbols: { 'ETH-USD': { max_order_notional: 100 } },
        },
      });

      expect(describeStrategies(config)).toEqual([
        'Strategies:',
        '===========',
        '  btc-quoter (spread_quoter) [ENABLED]',
        '    Symbols: BTC-USD',
        '    Options: {"order_size":0.001,"max_position":0.01}',
        '  eth-quoter (spread_quoter) [DISABLED]',
        '    Symbols: ETH-USD',
        '    Options: {"order_size":0.1,"max_position":1}',
        '',
        'Risk limits:',
        '  Max open orders per symbol: 4',
        '  Max position per symbol: 0.05',
        '  Max order notional: 500',
        '  ETH-USD: {"max_order_notional":100}',
      ]);
    });

    it('fails on options the strategy type rejects', () => {
      const config = strategyConfigSchema.parse({
        strategies: [{ id: 'bad', type: 'spread_quoter', symbols: ['BTC-USD'], options: { order_size: 1 } }],
        risk_limits: { max_position_per_symbol: 1, max_order_notional: 100 },
      });

      expect(() => describeStrategies(config)).toThrow();
    });
  });

  // ============================================================
  // check-config
  // ============================================================

  describe('describeConfig', () => {
    it('prints settings and only whether credentials exist', () => {
      const lines = describeConfig(createConfig({
        credentials: { apiKey: 'test-key', apiSecret: 'test-secret', passphrase: 'test-pass' },
      }));

      expect(lines).toEqual([
        'ordercraft configuration',
        '========================',
        'REST API: https://api.example.com',
        'WebSocket: wss://ws.example.com',
        'Credentials: configured',
        'Strategy config: (default strategies.json)',
        'Simulate orders: false',
        'Cancel on shutdown: true',
        'Rate limit: 5 requests / 1000ms',
        'Retry: 4 attempts, backoff 250-8000ms',
        'Request timeout: 10000ms',
        'Audit retention: 3600000ms',
        'Unknown-order sweep: every 5000ms',
      ]);
      expect(lines.join('\n')).not.toContain('test-secret');
    });

    it('shows a configured strategy path and missing credentials', () => {
      const lines = describeConfig(createConfig({ strategyConfigPath: 'conf/strategies.json' }));

      expect(lines[4]).toBe('Credentials: not configured');
      expect(lines[5]).toBe('Strategy config: conf/strategies.json');
    });
  });
});
