import { GridBacktestStep } from '@services/core/backtest/gridBacktest.types';
import { CompletedPeriod } from '@services/core/pipeline/pipeline.types';
import { toISODate } from '@utils/date/date.utils';
import { formatAmount, formatPercent } from '@utils/string/string.utils';
import { kebabCase, max } from 'lodash-es';
import { SummaryRow } from './reporter.types';

const describeBest = (isBestReturn: boolean, isBestWinRate: boolean) =>
  [isBestReturn && 'best return', isBestWinRate && 'best win rate'].filter(Boolean).join(', ');

/** One row per backtested period, flagging the periods with the highest return and win rate. */
export const buildSummaryRows = (completed: readonly CompletedPeriod[]): SummaryRow[] => {
  const bestReturn = max(completed.map(({ outcome }) => outcome.result.cumulativeReturn));
  const bestWinRate = max(completed.map(({ outcome }) => outcome.result.winRate));

  return completed.map(({ period, outcome: { result } }) => ({
    period: period.label,
    start: toISODate(period.start),
    end: toISODate(period.end),
    buys: result.buyCount,
    sells: result.sellCount,
    cumulativeReturn: formatPercent(result.cumulativeReturn, 2),
    maxDrawdown: formatPercent(result.maxDrawdown, 2),
    dailyWinRate: formatPercent(result.winRate, 1),
    totalTrades: result.totalTrades,
    finalPositionValue: formatAmount(result.finalPositionValue),
    best: describeBest(result.cumulativeReturn === bestReturn, result.winRate === bestWinRate),
  }));
};

export const toSummaryCsvLine = (symbol: string, row: SummaryRow) =>
  [
    symbol,
    row.period,
    row.start,
    row.end,
    row.buys,
    row.sells,
    row.cumulativeReturn,
    row.maxDrawdown,
    row.dailyWinRate,
    row.totalTrades,
    row.finalPositionValue,
  ].join(';') + '\n';

export const toEquityCurveCsvLines = (steps: readonly GridBacktestStep[]) =>
  steps
    .map(({ date, close, change, action, shares, cash, equity }) =>
      [toISODate(date), close, change, action, shares, cash, equity].join(';'),
    )
    .join('\n') + '\n';

export const getEquityCurveFileName = (symbol: string, periodLabel: string) =>
  `${kebabCase(`${symbol} ${periodLabel}`)}-equity.csv`;
