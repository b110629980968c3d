import { PriceSeries } from '@models/priceSeries.types';
import {
  calculateCumulativeReturn,
  calculateDailyChanges,
  calculateDailyWinRate,
  calculateMaxDrawdown,
} from '@utils/finance/stats.utils';
import { GridAction, GridBacktestOutcome, GridBacktestStep, GridStrategyParams, PortfolioState } from './gridBacktest.types';
import { validateParams, validateSeries } from './gridBacktest.utils';

/**
 * Replays the asymmetric grid rule over a daily series.
 *
 * Each day is decided on its own change and the position left by the previous day:
 * a drop of at least `buyDropPct` buys `tradeAmount` worth of units, otherwise a rise
 * of at least `sellRisePct` sells up to `tradeAmount` worth of the held units.
 * The first day never trades. Cash is not funded upfront and goes negative on buys.
 *
 * @throws InvalidInputError on an empty series, a non-positive close, unordered dates or out of bounds params
 */
export const runGridBacktest = (series: PriceSeries, params: GridStrategyParams): GridBacktestOutcome => {
  const { buyDropPct, sellRisePct, tradeAmount } = validateParams(params);
  validateSeries(series);

  const buyThreshold = -buyDropPct / 100;
  const sellThreshold = sellRisePct / 100;
  const changes = calculateDailyChanges(series.map(({ close }) => close));

  const portfolio: PortfolioState = { cash: 0, shares: 0 };
  let buyCount = 0;
  let sellCount = 0;
  const steps: GridBacktestStep[] = [];

  for (let i = 0; i < series.length; i++) {
    const { date, close } = series[i];
    const change = changes[i];
    let action: GridAction = 'HOLD';

    if (change <= buyThreshold) {
      portfolio.shares += tradeAmount / close;
      portfolio.cash -= tradeAmount;
      buyCount++;
      action = 'BUY';
    } else if (change >= sellThreshold && portfolio.shares > 0) {
      const positionValue = portfolio.shares * close;
      if (positionValue <= tradeAmount) {
        // Whole position goes out
        portfolio.cash += positionValue;
        portfolio.shares = 0;
      } else {
        portfolio.cash += tradeAmount;
        portfolio.shares = Math.max(0, portfolio.shares - tradeAmount / close);
      }
      sellCount++;
      action = 'SELL';
    }

    steps.push({
      date,
      close,
      change,
      action,
      shares: portfolio.shares,
      cash: portfolio.cash,
      equity: portfolio.shares * close + portfolio.cash,
    });
  }

  const trajectory = steps.map(({ equity }) => equity);
  const finalEquity = trajectory[trajectory.length - 1];
  const lastClose = series[series.length - 1].close;
  const totalInvested = buyCount * tradeAmount;

  return {
    result: {
      buyCount,
      sellCount,
      totalTrades: buyCount + sellCount,
      totalInvested,
      cumulativeReturn: calculateCumulativeReturn(finalEquity, totalInvested),
      maxDrawdown: calculateMaxDrawdown(trajectory),
      winRate: calculateDailyWinRate(trajectory),
      finalPositionValue: portfolio.shares * lastClose,
      finalShares: portfolio.shares,
      finalCash: portfolio.cash,
      finalEquity,
    },
    trajectory,
    steps,
  };
};
