import { DataUnavailableError } from '@errors/priceProvider/dataUnavailable.error';
import { PriceProviderNetworkError } from '@errors/priceProvider/priceProviderNetwork.error';
import { Period } from '@models/period.types';
import { config } from '@services/configuration/configuration';
import { runGridBacktest } from '@services/core/backtest/gridBacktest';
import { GridStrategyParams } from '@services/core/backtest/gridBacktest.types';
import { info, warning } from '@services/logger';
import { CachedPriceProvider } from '@services/priceProvider/cache/cachedPriceProvider';
import { PriceProvider } from '@services/priceProvider/priceProvider.types';
import { YahooPriceProvider } from '@services/priceProvider/yahoo/yahooPriceProvider';
import { Reporter } from '@services/reporter/reporter';
import { toISODate } from '@utils/date/date.utils';
import { BacktestRequest, PeriodOutcome } from './pipeline.types';

const runPeriod = async (
  symbol: string,
  params: GridStrategyParams,
  period: Period,
  provider: PriceProvider,
): Promise<PeriodOutcome> => {
  const { label, start, end } = period;
  try {
    const series = await provider.getPriceSeries({ symbol, start, end });
    const outcome = runGridBacktest(series, params);
    info('pipeline', { symbol, period: label, from: toISODate(start), to: toISODate(end), ...outcome.result });
    return { status: 'completed', period, series, outcome };
  } catch (err) {
    // Missing data only costs this period; an unreachable provider or a bad series stops the run
    if (err instanceof DataUnavailableError && !(err instanceof PriceProviderNetworkError)) {
      warning('pipeline', `Skipping "${label}": ${err.message}`);
      return { status: 'skipped', period, reason: err.message };
    }
    throw err;
  }
};

/** Backtests every period independently, keeping the periods' order. */
export const runBacktests = ({ symbol, params, periods, provider }: BacktestRequest): Promise<PeriodOutcome[]> =>
  Promise.all(periods.map(period => runPeriod(symbol, params, period, provider)));

export const gridlabPipeline = async (now: EpochTimeStamp = Date.now()) => {
  const symbol = config.getSymbol();
  const params = config.getStrategy();
  const periods = config.getPeriods(now);
  const provider = new CachedPriceProvider(new YahooPriceProvider(), config.getCache().ttl);

  info('pipeline', `Backtesting ${symbol} over ${periods.length} period(s)`);
  const outcomes = await runBacktests({ symbol, params, periods, provider });

  new Reporter(config.getReport(), symbol).publish(outcomes);
  return outcomes;
};
