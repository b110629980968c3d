import { DEFAULT_STRATEGY_PARAMS } from '@services/core/backtest/gridBacktest.const';
import { gridStrategyParamsSchema } from '@services/core/backtest/gridBacktest.schema';
import { DEFAULT_CACHE_TTL } from '@services/priceProvider/cache/cachedPriceProvider.const';
import { DEFAULT_SYMBOL } from '@services/symbolDirectory/symbolDirectory.const';
import { z } from 'zod';
import { DEFAULT_REPORT_FILE_NAME, VIEW_MODES } from './configuration.const';

export const periodSchema = z.object({
  label: z.string().min(1),
  start: z.iso.date(),
  end: z.iso.date().optional(),
});

const { buyDropPct, sellRisePct, tradeAmount } = gridStrategyParamsSchema.shape;

export const strategySchema = z
  .object({
    buyDropPct: buyDropPct.default(DEFAULT_STRATEGY_PARAMS.buyDropPct),
    sellRisePct: sellRisePct.default(DEFAULT_STRATEGY_PARAMS.sellRisePct),
    tradeAmount: tradeAmount.default(DEFAULT_STRATEGY_PARAMS.tradeAmount),
  })
  .default({ ...DEFAULT_STRATEGY_PARAMS });

export const cacheSchema = z
  .object({
    ttl: z.number().positive().default(DEFAULT_CACHE_TTL),
  })
  .default({ ttl: DEFAULT_CACHE_TTL });

export const reportSchema = z
  .object({
    consoleTable: z.boolean().default(true),
    csv: z
      .object({
        filePath: z.string().min(1),
        fileName: z.string().min(1).default(DEFAULT_REPORT_FILE_NAME),
        equityCurves: z.boolean().default(true),
      })
      .nullable()
      .default(null),
  })
  .default({ consoleTable: true, csv: null });

export const configurationSchema = z
  .object({
    symbol: z.string().min(1).default(DEFAULT_SYMBOL),
    search: z.string().optional(),
    view: z.enum(VIEW_MODES).default('bull-markets'),
    periods: z.array(periodSchema).default([]),
    strategy: strategySchema,
    cache: cacheSchema,
    report: reportSchema,
  })
  .superRefine((data, ctx) => {
    if (data.view === 'custom' && !data.periods.length) {
      ctx.addIssue({
        code: 'custom',
        path: ['periods'],
        message: 'periods are required for the custom view',
      });
    }
  });
