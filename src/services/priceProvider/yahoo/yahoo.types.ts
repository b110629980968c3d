import { z } from 'zod';
import { yahooChartResultSchema } from './yahoo.schema';

export type YahooChartResult = z.infer<typeof yahooChartResultSchema>;
