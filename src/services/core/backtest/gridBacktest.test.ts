import { InvalidInputError } from '@errors/backtest/invalidInput.error';
import { PriceSeries } from '@models/priceSeries.types';
import { describe, expect, it } from 'vitest';
import { runGridBacktest } from './gridBacktest';
import { GridStrategyParams } from './gridBacktest.types';

const DAY = 86_400_000;
const START = Date.UTC(2024, 0, 1);

const toSeries = (closes: number[]): PriceSeries => closes.map((close, i) => ({ date: START + i * DAY, close }));

const DEFAULT_PARAMS: GridStrategyParams = { buyDropPct: 1, sellRisePct: 1.5, tradeAmount: 1000 };

describe('runGridBacktest', () => {
  describe('buy then partial sell', () => {
    const { result, trajectory, steps } = runGridBacktest(toSeries([100, 99, 100.5, 102]), DEFAULT_PARAMS);
    const remainingShares = 1000 / 99 - 1000 / 100.5;

    it('triggers one buy on the 1% drop and one sell on the 1.5% rise', () => {
      expect(steps.map(({ action }) => action)).toEqual(['HOLD', 'BUY', 'SELL', 'HOLD']);
      expect(result.buyCount).toBe(1);
      expect(result.sellCount).toBe(1);
      expect(result.totalTrades).toBe(2);
      expect(result.totalInvested).toBe(1000);
    });

    it('tracks cash and shares after each trade', () => {
      expect(steps[1].shares).toBeCloseTo(1000 / 99, 12);
      expect(steps[1].cash).toBe(-1000);
      expect(steps[2].shares).toBeCloseTo(remainingShares, 12);
      expect(steps[2].cash).toBe(0);
      expect(steps[3].shares).toBe(steps[2].shares);
    });

    it('marks equity to market with the post-trade position', () => {
      expect(trajectory).toHaveLength(4);
      expect(trajectory[0]).toBe(0);
      expect(trajectory[1]).toBeCloseTo(0, 9);
      expect(trajectory[2]).toBeCloseTo(remainingShares * 100.5, 9);
      expect(trajectory[3]).toBeCloseTo(remainingShares * 102, 9);
    });

    it('derives the summary statistics', () => {
      expect(result.cumulativeReturn).toBeCloseTo((remainingShares * 102) / 1000 - 1, 12);
      expect(result.cumulativeReturn).toBeCloseTo(-0.984622, 6);
      expect(result.winRate).toBe(2 / 3);
      expect(result.maxDrawdown).toBe(0);
      expect(result.finalPositionValue).toBeCloseTo(remainingShares * 102, 9);
      expect(result.finalCash).toBe(0);
      expect(result.finalEquity).toBe(trajectory[3]);
    });
  });

  describe('sell capped by the held position', () => {
    const { result, trajectory, steps } = runGridBacktest(toSeries([100, 90, 99, 108.9, 119.79]), {
      buyDropPct: 5,
      sellRisePct: 5,
      tradeAmount: 1000,
    });

    it('sells the whole remaining position when it is worth less than the trade amount', () => {
      expect(steps.map(({ action }) => action)).toEqual(['HOLD', 'BUY', 'SELL', 'SELL', 'HOLD']);
      expect(steps[3].shares).toBe(0);
      expect(steps[3].cash).toBeCloseTo(110, 9);
    });

    it('does not sell without shares', () => {
      expect(steps[4].action).toBe('HOLD');
      expect(result.sellCount).toBe(2);
      expect(result.finalShares).toBe(0);
      expect(result.finalPositionValue).toBe(0);
    });

    it('derives the summary statistics', () => {
      expect(trajectory[1]).toBe(0);
      expect(trajectory[4]).toBeCloseTo(110, 9);
      expect(result.cumulativeReturn).toBeCloseTo(-0.89, 12);
      expect(result.winRate).toBe(0.5);
      expect(result.maxDrawdown).toBe(0);
    });
  });

  it('buys on every qualifying drop, letting cash go negative', () => {
    const { result, steps } = runGridBacktest(toSeries([100, 98, 96, 94]), DEFAULT_PARAMS);

    expect(result.buyCount).toBe(3);
    expect(result.finalCash).toBe(-3000);
    expect(steps[3].shares).toBeCloseTo(1000 / 98 + 1000 / 96 + 1000 / 94, 12);
    expect(result.cumulativeReturn).toBeCloseTo(result.finalEquity / 3000 - 1, 12);
  });

  it('measures the drawdown from a positive running peak', () => {
    const { result, trajectory } = runGridBacktest(toSeries([100, 90, 108, 97.2]), {
      buyDropPct: 5,
      sellRisePct: 50,
      tradeAmount: 900,
    });

    expect(trajectory[2]).toBeCloseTo(180, 9);
    expect(trajectory[3]).toBeCloseTo(72, 9);
    expect(result.maxDrawdown).toBeCloseTo(-0.6, 12);
  });

  it('returns a zero trade result for a single observation', () => {
    const { result, trajectory, steps } = runGridBacktest(toSeries([42]), DEFAULT_PARAMS);

    expect(trajectory).toEqual([0]);
    expect(steps[0].action).toBe('HOLD');
    expect(result).toEqual({
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
    });
  });

  it('reports a cumulative return of exactly 0 when nothing was bought', () => {
    const { result } = runGridBacktest(toSeries([100, 102, 104.04, 103]), DEFAULT_PARAMS);

    expect(result.buyCount).toBe(0);
    expect(result.sellCount).toBe(0);
    expect(result.cumulativeReturn).toBe(0);
  });

  it('is deterministic', () => {
    const series = toSeries([10, 9.8, 10.1, 9.7, 9.9, 10.4, 10.2]);
    expect(runGridBacktest(series, DEFAULT_PARAMS)).toStrictEqual(runGridBacktest(series, DEFAULT_PARAMS));
  });

  it('holds its invariants on a long oscillating series', () => {
    const closes = Array.from({ length: 500 }, (_, i) => 100 + Math.sin(i / 3) * 8 + Math.cos(i / 7) * 3);
    const { result, trajectory, steps } = runGridBacktest(toSeries(closes), {
      buyDropPct: 0.5,
      sellRisePct: 0.8,
      tradeAmount: 250,
    });

    expect(trajectory).toHaveLength(closes.length);
    expect(steps[0].action).toBe('HOLD');
    expect(steps.every(({ shares }) => shares >= 0)).toBe(true);
    expect(result.buyCount).toBeGreaterThan(0);
    expect(result.maxDrawdown).toBeLessThanOrEqual(0);
    expect(result.winRate).toBeGreaterThanOrEqual(0);
    expect(result.winRate).toBeLessThanOrEqual(1);
  });

  describe('invalid input', () => {
    it('rejects an empty series', () => {
      expect(() => runGridBacktest([], DEFAULT_PARAMS)).toThrow(InvalidInputError);
      expect(() => runGridBacktest([], DEFAULT_PARAMS)).toThrow('[BACKTEST] Invalid input: price series is empty');
    });

    it.each`
      close
      ${0}
      ${-3}
      ${NaN}
      ${Infinity}
    `('rejects a close of $close', ({ close }) => {
      expect(() => runGridBacktest(toSeries([100, close, 101]), DEFAULT_PARAMS)).toThrow(
        `[BACKTEST] Invalid input: non-positive close ${close} on 2024-01-02 (index 1)`,
      );
    });

    it('rejects dates that are not strictly increasing', () => {
      const series = [
        { date: START, close: 100 },
        { date: START, close: 101 },
      ];
      expect(() => runGridBacktest(series, DEFAULT_PARAMS)).toThrow(
        '[BACKTEST] Invalid input: dates must be strictly increasing (2024-01-01 then 2024-01-01, index 1)',
      );
    });

    it.each`
      field            | value
      ${'buyDropPct'}  | ${0}
      ${'buyDropPct'}  | ${-1}
      ${'buyDropPct'}  | ${100.5}
      ${'sellRisePct'} | ${0}
      ${'sellRisePct'} | ${101}
      ${'tradeAmount'} | ${0}
      ${'tradeAmount'} | ${-500}
      ${'tradeAmount'} | ${NaN}
    `('rejects $field = $value', ({ field, value }) => {
      const params = { ...DEFAULT_PARAMS, [field]: value };
      expect(() => runGridBacktest(toSeries([100, 99]), params)).toThrow(InvalidInputError);
      expect(() => runGridBacktest(toSeries([100, 99]), params)).toThrow(field);
    });

    it('accepts thresholds at the 100% upper bound', () => {
      const { result } = runGridBacktest(toSeries([100, 50, 0.01]), {
        buyDropPct: 100,
        sellRisePct: 100,
        tradeAmount: 1000,
      });
      expect(result.buyCount).toBe(0);
    });
  });
});
