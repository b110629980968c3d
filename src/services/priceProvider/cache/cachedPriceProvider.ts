import { PriceSeries, PriceSeriesRequest } from '@models/priceSeries.types';
import { debug } from '@services/logger';
import { PriceProvider } from '../priceProvider.types';
import { DEFAULT_CACHE_TTL } from './cachedPriceProvider.const';
import { CacheEntry } from './cachedPriceProvider.types';

export const toCacheKey = ({ symbol, start, end }: PriceSeriesRequest) => `${symbol}|${start}|${end}`;

/**
 * Memoizes series per (symbol, start, end) for `ttl` milliseconds.
 * Concurrent requests for the same key share one call; failures are not kept.
 */
export class CachedPriceProvider implements PriceProvider {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly provider: PriceProvider;
  private readonly ttl: number;

  constructor(provider: PriceProvider, ttl: number = DEFAULT_CACHE_TTL) {
    this.provider = provider;
    this.ttl = ttl;
  }

  public getPriceSeries(request: PriceSeriesRequest): Promise<PriceSeries> {
    const key = toCacheKey(request);
    const now = Date.now();
    const entry = this.entries.get(key);

    if (entry && entry.expiresAt > now) {
      debug('cache', `Hit for ${key}`);
      return entry.value;
    }

    debug('cache', `Miss for ${key}`);
    this.evictExpired(now);
    const expiresAt = now + this.ttl;
    const value = this.load(key, request, expiresAt);
    this.entries.set(key, { value, expiresAt });
    return value;
  }

  public clear() {
    this.entries.clear();
  }

  public get size() {
    return this.entries.size;
  }

  private evictExpired(now: EpochTimeStamp) {
    for (const [key, { expiresAt }] of this.entries) {
      if (expiresAt <= now) this.entries.delete(key);
    }
  }

  private async load(key: string, request: PriceSeriesRequest, expiresAt: EpochTimeStamp) {
    try {
      return await this.provider.getPriceSeries(request);
    } catch (err) {
      if (this.entries.get(key)?.expiresAt === expiresAt) this.entries.delete(key);
      throw err;
    }
  }
}
