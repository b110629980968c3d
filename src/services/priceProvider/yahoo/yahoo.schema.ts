import { z } from 'zod';

const nullableSeriesSchema = z.array(z.number().nullable());

export const yahooChartResultSchema = z.object({
  meta: z.object({
    symbol: z.string(),
    currency: z.string().nullish(),
    gmtoffset: z.number().default(0),
  }),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(z.object({ close: nullableSeriesSchema.optional() })).default([]),
    adjclose: z.array(z.object({ adjclose: nullableSeriesSchema.optional() })).optional(),
  }),
});

export const yahooChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(yahooChartResultSchema).nullable().default(null),
    error: z.object({ code: z.string(), description: z.string().nullish() }).nullable().default(null),
  }),
});
