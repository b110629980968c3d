import { BacktestResult, GridBacktestStep } from '@services/core/backtest/gridBacktest.types';
import { CompletedPeriod } from '@services/core/pipeline/pipeline.types';

const EMPTY_RESULT: BacktestResult = {
  buyCount: 0,
  sellCount: 0,
  totalTrades: 0,
  totalInvested: 0,
  cumulativeReturn: 0,
  maxDrawdown: 0,
  winRate: 0,
  finalPositionValue: 0,
  finalShares: 0,
  finalCash: 0,
  finalEquity: 0,
};

export const STEPS: GridBacktestStep[] = [
  { date: Date.UTC(2024, 0, 1), close: 100, change: 0, action: 'HOLD', shares: 0, cash: 0, equity: 0 },
  { date: Date.UTC(2024, 0, 2), close: 99, change: -0.01, action: 'BUY', shares: 10, cash: -1000, equity: -10 },
];

export const makeCompletedPeriod = (
  label: string,
  result: Partial<BacktestResult>,
  steps: GridBacktestStep[] = STEPS,
): CompletedPeriod => ({
  status: 'completed',
  period: { label, start: Date.UTC(2024, 0, 1), end: Date.UTC(2024, 3, 1) },
  series: steps.map(({ date, close }) => ({ date, close })),
  outcome: { result: { ...EMPTY_RESULT, ...result }, trajectory: steps.map(({ equity }) => equity), steps },
});
