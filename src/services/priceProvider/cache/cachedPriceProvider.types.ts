import { PriceSeries } from '@models/priceSeries.types';

export interface CacheEntry {
  value: Promise<PriceSeries>;
  expiresAt: EpochTimeStamp;
}
