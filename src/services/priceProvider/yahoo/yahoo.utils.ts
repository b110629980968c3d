import { PricePoint, PriceSeries, PriceSeriesRequest } from '@models/priceSeries.types';
import { fromEpochSeconds, startOfUTCDay, toEpochSeconds } from '@utils/date/date.utils';
import { isNil, sortBy } from 'lodash-es';
import { YAHOO_CHART_URL } from './yahoo.const';
import { YahooChartResult } from './yahoo.types';

export const buildChartUrl = ({ symbol, start, end }: PriceSeriesRequest) => {
  const query = new URLSearchParams({
    period1: `${toEpochSeconds(start)}`,
    period2: `${toEpochSeconds(end)}`,
    interval: '1d',
    events: 'div,split',
    includeAdjustedClose: 'true',
  });
  return `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}?${query.toString()}`;
};

/**
 * Maps a chart result to daily closes, preferring split/dividend adjusted values.
 * Bars without a close are dropped. Bars are keyed by the exchange's calendar day,
 * a later bar on the same day replacing an earlier one.
 */
export const toPriceSeries = ({ meta, timestamp = [], indicators }: YahooChartResult): PriceSeries => {
  const closes = indicators.adjclose?.[0]?.adjclose ?? indicators.quote[0]?.close ?? [];
  const byDay = new Map<EpochTimeStamp, PricePoint>();

  timestamp.forEach((seconds, index) => {
    const close = closes[index];
    if (isNil(close)) return;
    const date = startOfUTCDay(fromEpochSeconds(seconds + meta.gmtoffset));
    byDay.set(date, { date, close });
  });

  return sortBy([...byDay.values()], 'date');
};
