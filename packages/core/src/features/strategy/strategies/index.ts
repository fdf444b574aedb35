import type { RiskLimits } from '../../risk/risk-controller.js';
import type { StrategyEntry } from '../strategy-config.js';
import type { Strategy, StrategyRegistration } from '../strategy.js';
import { SpreadQuoter, spreadQuoterOptionsSchema } from './spread-quoter.js';

export { SpreadQuoter, spreadQuoterOptionsSchema, type SpreadQuoterOptions } from './spread-quoter.js';

export interface StrategyFactory {
  /** Validates options and builds the instance plus any limit tightening. */
  create(options: Record<string, unknown>): { strategy: Strategy; limits?: Partial<RiskLimits> };
}

const FACTORIES: Record<string, StrategyFactory> = {
  spread_quoter: {
    create(options) {
      const parsed = spreadQuoterOptionsSchema.parse(options);
      return {
        strategy: new SpreadQuoter(parsed),
        limits: { max_position_per_symbol: parsed.max_position },
      };
    },
  },
};

export function strategyTypes(): string[] {
  return Object.keys(FACTORIES);
}

/**
 * Build a runner registration from a config entry.
 */
export function createRegistration(entry: StrategyEntry): StrategyRegistration {
  const factory = FACTORIES[entry.type];
  if (!factory) {
    throw new Error(`Unknown strategy type "${entry.type}" for ${entry.id} (known: ${strategyTypes().join(', ')})`);
  }

  const { strategy, limits } = factory.create(entry.options);
  return {
    id: entry.id,
    strategy,
    symbols: [...entry.symbols],
    limits,
  };
}
