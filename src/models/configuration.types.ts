import { z } from 'zod';
import {
  cacheSchema,
  configurationSchema,
  reportSchema,
  strategySchema,
} from '../services/configuration/configuration.schema';

export type Configuration = z.infer<typeof configurationSchema>;
export type StrategyConfig = z.infer<typeof strategySchema>;
export type CacheConfig = z.infer<typeof cacheSchema>;
export type ReportConfig = z.infer<typeof reportSchema>;
