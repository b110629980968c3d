import { PricePoint } from '@models/priceSeries.types';

/** Strategy configuration parameters */
export interface GridStrategyParams {
  /** Daily decline, in percent (1 === 1%), at or beyond which a buy is triggered */
  buyDropPct: number;
  /** Daily rise, in percent, at or beyond which a sell is triggered */
  sellRisePct: number;
  /** Notional currency amount traded on each trigger */
  tradeAmount: number;
}

export type GridAction = 'BUY' | 'SELL' | 'HOLD';

/** Running position. Cash goes negative as capital gets deployed. */
export interface PortfolioState {
  cash: number;
  shares: number;
}

/** Post-trade state for one day of the series */
export interface GridBacktestStep extends PricePoint, PortfolioState {
  change: number;
  action: GridAction;
  equity: number;
}

export interface BacktestResult {
  buyCount: number;
  sellCount: number;
  totalTrades: number;
  totalInvested: number;
  /** Ratio, -0.25 === -25% */
  cumulativeReturn: number;
  /** Ratio <= 0 */
  maxDrawdown: number;
  /** Ratio in [0, 1] */
  winRate: number;
  finalPositionValue: number;
  finalShares: number;
  finalCash: number;
  finalEquity: number;
}

export interface GridBacktestOutcome {
  result: BacktestResult;
  /** Equity per day, same length as the input series */
  trajectory: readonly number[];
  steps: readonly GridBacktestStep[];
}
