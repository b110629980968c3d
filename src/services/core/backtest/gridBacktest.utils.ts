import { InvalidInputError } from '@errors/backtest/invalidInput.error';
import { PriceSeries } from '@models/priceSeries.types';
import { toISODate } from '@utils/date/date.utils';
import { RECOMMENDED_PCT_RANGE } from './gridBacktest.const';
import { gridStrategyParamsSchema } from './gridBacktest.schema';
import { GridStrategyParams } from './gridBacktest.types';

export const validateParams = (params: GridStrategyParams): GridStrategyParams => {
  const parsed = gridStrategyParamsSchema.safeParse(params);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new InvalidInputError(details);
  }
  return parsed.data;
};

export const validateSeries = (series: PriceSeries) => {
  if (!series.length) throw new InvalidInputError('price series is empty');

  series.forEach(({ date, close }, index) => {
    if (!Number.isFinite(close) || close <= 0)
      throw new InvalidInputError(`non-positive close ${close} on ${toISODate(date)} (index ${index})`);

    const previous = series[index - 1];
    if (previous && date <= previous.date)
      throw new InvalidInputError(
        `dates must be strictly increasing (${toISODate(previous.date)} then ${toISODate(date)}, index ${index})`,
      );
  });
};

/** Names of the thresholds that fall outside the recommended exploration range. */
export const listThresholdsOutOfRecommendedRange = ({ buyDropPct, sellRisePct }: GridStrategyParams) =>
  Object.entries({ buyDropPct, sellRisePct })
    .filter(([, value]) => value < RECOMMENDED_PCT_RANGE.min || value > RECOMMENDED_PCT_RANGE.max)
    .map(([name]) => name);
