export type { Strategy, StrategyContext, StrategyRegistration } from './strategy.js';
export {
  StrategyRunner,
  type OrderGateway,
  type SnapshotSource,
  type StrategyRunnerDeps,
  type StrategyStatus,
} from './strategy-runner.js';
export {
  loadStrategyConfig,
  strategyConfigSchema,
  riskLimitsSchema,
  type StrategyConfig,
  type StrategyEntry,
  type RiskLimitsSettings,
} from './strategy-config.js';
export {
  createRegistration,
  strategyTypes,
  SpreadQuoter,
  spreadQuoterOptionsSchema,
  type SpreadQuoterOptions,
  type StrategyFactory,
} from './strategies/index.js';
