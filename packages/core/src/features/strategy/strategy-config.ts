import { z } from 'zod';
import * as fs from 'fs';
import { createLogger } from '../../shared/logger.js';

const logger = createLogger('StrategyConfig');

// --- Risk Limits Schema ---

export const symbolRiskLimitsSchema = z.object({
  max_open_orders_per_symbol: z.number().int().positive().optional(),
  max_position_per_symbol: z.number().positive().optional(),
  max_order_notional: z.number().positive().optional(),
});

export const riskLimitsSchema = z.object({
  max_open_orders_per_symbol: z.number().int().positive().default(4),
  max_position_per_symbol: z.number().positive(),
  max_order_notional: z.number().positive(),
  symbols: z.record(z.string(), symbolRiskLimitsSchema).default({}),
});

export type RiskLimitsSettings = z.infer<typeof riskLimitsSchema>;

// --- Strategy Entry Schema ---

export const strategyEntrySchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  symbols: z.array(z.string().min(1)).min(1),
  enabled: z.boolean().default(true),
  options: z.record(z.string(), z.unknown()).default({}),
});

export type StrategyEntry = z.infer<typeof strategyEntrySchema>;

// --- Strategy Config Schema ---

export const strategyConfigSchema = z.object({
  strategies: z.array(strategyEntrySchema),
  risk_limits: riskLimitsSchema,
  _description: z.string().optional(),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.strategies.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['strategies', index, 'id'],
        message: `Duplicate strategy id: ${entry.id}`,
      });
    }
    seen.add(entry.id);
  });
});

export type StrategyConfig = z.infer<typeof strategyConfigSchema>;

// --- Loader ---

export function loadStrategyConfig(filePath: string): StrategyConfig {
  logger.info({ path: filePath }, 'Loading strategy config');

  if (!fs.existsSync(filePath)) {
    throw new Error(
      `Strategy config not found: ${filePath}\n` +
      'Create one from the example: cp strategies.example.json strategies.json\n' +
      'Or set STRATEGY_CONFIG_PATH to the correct path.',
    );
  }

  const raw = fs.readFileSync(filePath, 'utf-8');
  const json: unknown = JSON.parse(raw);
  const config = strategyConfigSchema.parse(json);

  logger.info(
    {
      strategies: config.strategies.length,
      enabled: config.strategies.filter((s) => s.enabled).length,
    },
    'Strategy config loaded',
  );

  return config;
}
