/** One daily observation: the trading day (UTC midnight, epoch ms) and its closing price. */
export interface PricePoint {
  date: EpochTimeStamp;
  close: number;
}

/** Chronologically ordered daily closes, oldest first. */
export type PriceSeries = ReadonlyArray<PricePoint>;

export interface PriceSeriesRequest {
  symbol: string;
  /** Inclusive start of the range (epoch ms) */
  start: EpochTimeStamp;
  /** Exclusive end of the range (epoch ms) */
  end: EpochTimeStamp;
}
