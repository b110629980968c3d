import { z } from 'zod';

export const gridStrategyParamsSchema = z.object({
  buyDropPct: z.number().positive().max(100),
  sellRisePct: z.number().positive().max(100),
  tradeAmount: z.number().positive(),
});
