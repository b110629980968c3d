import { describe, expect, it } from 'vitest';
import { makeCompletedPeriod, STEPS } from './reporter.fixtures';
import { buildSummaryRows, getEquityCurveFileName, toEquityCurveCsvLines, toSummaryCsvLine } from './reporter.utils';

const first = makeCompletedPeriod('q1', {
  buyCount: 1,
  sellCount: 1,
  totalTrades: 2,
  cumulativeReturn: -0.984622342831298,
  maxDrawdown: 0,
  winRate: 2 / 3,
  finalPositionValue: 15.377657168701965,
});
const second = makeCompletedPeriod('q2', {
  buyCount: 40,
  sellCount: 12,
  totalTrades: 52,
  cumulativeReturn: 0.1234,
  maxDrawdown: -0.2,
  winRate: 0.5,
  finalPositionValue: 1234567.8,
});

describe('buildSummaryRows', () => {
  it('formats every column and flags the best periods', () => {
    expect(buildSummaryRows([first, second])).toEqual([
      {
        period: 'q1',
        start: '2024-01-01',
        end: '2024-04-01',
        buys: 1,
        sells: 1,
        cumulativeReturn: '-98.46%',
        maxDrawdown: '0.00%',
        dailyWinRate: '66.7%',
        totalTrades: 2,
        finalPositionValue: '15',
        best: 'best win rate',
      },
      {
        period: 'q2',
        start: '2024-01-01',
        end: '2024-04-01',
        buys: 40,
        sells: 12,
        cumulativeReturn: '12.34%',
        maxDrawdown: '-20.00%',
        dailyWinRate: '50.0%',
        totalTrades: 52,
        finalPositionValue: '1,234,568',
        best: 'best return',
      },
    ]);
  });

  it('flags both columns on a single period', () => {
    expect(buildSummaryRows([second])[0].best).toBe('best return, best win rate');
  });

  it('returns no row without completed periods', () => {
    expect(buildSummaryRows([])).toEqual([]);
  });
});

describe('toSummaryCsvLine', () => {
  it('joins the row with semicolons', () => {
    const [row] = buildSummaryRows([first]);
    expect(toSummaryCsvLine('ACME', row)).toBe('ACME;q1;2024-01-01;2024-04-01;1;1;-98.46%;0.00%;66.7%;2;15\n');
  });
});

describe('toEquityCurveCsvLines', () => {
  it('writes one line per step', () => {
    expect(toEquityCurveCsvLines(STEPS)).toBe('2024-01-01;100;0;HOLD;0;0;0\n2024-01-02;99;-0.01;BUY;10;-1000;-10\n');
  });
});

describe('getEquityCurveFileName', () => {
  it('derives a file name from the symbol and period', () => {
    expect(getEquityCurveFileName('ACME', 'spring rally')).toBe('acme-spring-rally-equity.csv');
  });
});
