import { Period } from '@models/period.types';
import { PriceSeries } from '@models/priceSeries.types';
import { GridBacktestOutcome, GridStrategyParams } from '@services/core/backtest/gridBacktest.types';
import { PriceProvider } from '@services/priceProvider/priceProvider.types';

export interface CompletedPeriod {
  status: 'completed';
  period: Period;
  series: PriceSeries;
  outcome: GridBacktestOutcome;
}

export interface SkippedPeriod {
  status: 'skipped';
  period: Period;
  reason: string;
}

export type PeriodOutcome = CompletedPeriod | SkippedPeriod;

export interface BacktestRequest {
  symbol: string;
  params: GridStrategyParams;
  periods: readonly Period[];
  provider: PriceProvider;
}
