#!/usr/bin/env node
// ============================================================
// CLI: Commander-based CLI for the ordercraft engine
// Commands: start, strategies, check-config
// ============================================================

import { Command } from 'commander';
import { pathToFileURL } from 'node:url';
import { loadConfig, type EngineConfig } from './shared/config.js';
import { setLogLevel } from './shared/logger.js';
import { TradingEngine } from './engine.js';
import { loadStrategyConfig, type StrategyConfig } from './features/strategy/strategy-config.js';
import { createRegistration } from './features/strategy/strategies/index.js';
import type { ExchangeClient } from './features/execution/exchange-client.js';
import { SimulatedExchange } from './features/simulator/simulated-exchange.js';

const DEFAULT_STRATEGY_PATH = 'strategies.json';

interface StartOptions {
  simulate: boolean;
  cancelOnShutdown: boolean;
  strategies?: string;
  simPrice: string;
}

const program = new Command();

program
  .name('ordercraft')
  .description('ordercraft - order management and execution engine for exchange REST trading APIs')
  .version('0.1.0');

// --- start command ---
program
  .command('start')
  .description('Start the engine with the configured strategies')
  .option('--simulate', 'Trade against the in-process simulated exchange', false)
  .option('--cancel-on-shutdown', 'Cancel live orders on shutdown', false)
  .option('--strategies <path>', 'Strategy config file (default: STRATEGY_CONFIG_PATH or strategies.json)')
  .option('--sim-price <price>', 'Starting mid price for simulated symbols', '100')
  .action(async (options: StartOptions) => {
    try {
      const config = loadConfig();
      setLogLevel(config.logLevel);
      if (options.cancelOnShutdown) {
        config.cancelOnShutdown = true;
      }
      if (options.simulate) {
        config.simulateOrders = true;
      }

      const strategyConfig = loadStrategyConfig(
        options.strategies ?? config.strategyConfigPath ?? DEFAULT_STRATEGY_PATH,
      );
      const enabled = strategyConfig.strategies.filter((s) => s.enabled);
      if (enabled.length === 0) {
        console.error('Error: no enabled strategies in the strategy config.');
        process.exit(1);
      }

      const symbols = [...new Set(enabled.flatMap((s) => s.symbols))];
      const client = config.simulateOrders
        ? createSimulatedClient(Number(options.simPrice))
        : await createLiveClient(config);

      const engine = new TradingEngine(config, client, { riskLimits: strategyConfig.risk_limits });
      for (const entry of enabled) {
        engine.registerStrategy(createRegistration(entry));
      }

      engine.on('fill', (fill, order) => {
        console.log(`FILL  ${order.symbol}  ${order.side}  ${fill.quantity} @ ${fill.price}  order=${order.client_order_id}`);
      });
      engine.on('alert', (alert) => {
        console.error(`ALERT ${alert.code}  order=${alert.client_order_id}  ${alert.message}`);
      });
      engine.on('stopped', () => {
        process.exit(0);
      });

      const shutdown = (): void => {
        engine.stop().catch((error: unknown) => {
          console.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
          process.exit(1);
        });
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      await engine.start();

      if (client instanceof SimulatedExchange) {
        client.startRandomWalk({ prices: Object.fromEntries(symbols.map((s) => [s, Number(options.simPrice)])) });
        console.log('[SIMULATE] Simulated exchange active - no real orders will be sent');
      }
      console.log(`Engine started on ${client.exchange}. Strategies: ${enabled.map((s) => s.id).join(', ')}`);
      console.log(`Symbols: ${symbols.join(', ')}`);
      console.log('Press Ctrl+C to stop.');
    } catch (error) {
      console.error(`Failed to start engine: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

// --- strategies command ---
program
  .command('strategies [path]')
  .description('Validate a strategy config file and list its strategies')
  .action((path: string | undefined) => {
    try {
      const config = loadStrategyConfig(path ?? process.env.STRATEGY_CONFIG_PATH ?? DEFAULT_STRATEGY_PATH);
      for (const line of describeStrategies(config)) {
        console.log(line);
      }
    } catch (error) {
      console.error(`Invalid strategy config: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

// --- check-config command ---
program
  .command('check-config')
  .description('Validate environment configuration and print it without secrets')
  .action(() => {
    try {
      const config = loadConfig();
      for (const line of describeConfig(config)) {
        console.log(line);
      }
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

/**
 * Lines printed by `strategies`. Builds every registration so invalid
 * options fail here rather than at start.
 */
export function describeStrategies(config: StrategyConfig): string[] {
  const lines = ['Strategies:', '==========='];
  for (const entry of config.strategies) {
    createRegistration(entry);
    const state = entry.enabled ? '[ENABLED]' : '[DISABLED]';
    lines.push(`  ${entry.id} (${entry.type}) ${state}`);
    lines.push(`    Symbols: ${entry.symbols.join(', ')}`);
    lines.push(`    Options: ${JSON.stringify(entry.options)}`);
  }

  const limits = config.risk_limits;
  lines.push('');
  lines.push('Risk limits:');
  lines.push(`  Max open orders per symbol: ${limits.max_open_orders_per_symbol}`);
  lines.push(`  Max position per symbol: ${limits.max_position_per_symbol}`);
  lines.push(`  Max order notional: ${limits.max_order_notional}`);
  for (const [symbol, overrides] of Object.entries(limits.symbols)) {
    lines.push(`  ${symbol}: ${JSON.stringify(overrides)}`);
  }
  return lines;
}

/**
 * Lines printed by `check-config`. Credentials are only ever shown as
 * configured or not.
 */
export function describeConfig(config: EngineConfig): string[] {
  return [
    'ordercraft configuration',
    '========================',
    `REST API: ${config.apiUrl}`,
    `WebSocket: ${config.wsUrl}`,
    `Credentials: ${config.credentials ? 'configured' : 'not configured'}`,
    `Strategy config: ${config.strategyConfigPath ?? `(default ${DEFAULT_STRATEGY_PATH})`}`,
    `Simulate orders: ${config.simulateOrders}`,
    `Cancel on shutdown: ${config.cancelOnShutdown}`,
    `Rate limit: ${config.rateLimit.maxRequests} requests / ${config.rateLimit.intervalMs}ms`,
    `Retry: ${config.retry.maxAttempts} attempts, backoff ${config.retry.baseDelayMs}-${config.retry.maxDelayMs}ms`,
    `Request timeout: ${config.requestTimeoutMs}ms`,
    `Audit retention: ${config.auditRetentionMs}ms`,
    `Unknown-order sweep: every ${config.resolveIntervalMs}ms`,
  ];
}

function createSimulatedClient(price: number): SimulatedExchange {
  if (!(price > 0)) {
    throw new Error(`--sim-price must be a positive number (got ${price})`);
  }
  return new SimulatedExchange();
}

async function createLiveClient(config: EngineConfig): Promise<ExchangeClient> {
  if (!config.credentials) {
    throw new Error(
      'No exchange credentials configured. Set EXCHANGE_API_KEY, EXCHANGE_API_SECRET and ' +
      'EXCHANGE_API_PASSPHRASE, or run with --simulate.',
    );
  }
  // The connector depends on core, so core loads it lazily instead of
  // declaring it as a dependency.
  const { CoinbaseConnector } = await import('@ordercraft/connector-coinbase');
  return new CoinbaseConnector({
    apiUrl: config.apiUrl,
    wsUrl: config.wsUrl,
    credentials: config.credentials,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

export { program };

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  program.parse();
}
