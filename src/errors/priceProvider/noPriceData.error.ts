import { toISODate } from '@utils/date/date.utils';
import { Interval } from 'date-fns';
import { DataUnavailableError } from './dataUnavailable.error';

export class NoPriceDataError extends DataUnavailableError {
  constructor(symbol: string, { start, end }: Interval<EpochTimeStamp, EpochTimeStamp>) {
    super(`No price data for ${symbol} between ${toISODate(start)} and ${toISODate(end)}`);
    this.name = 'NoPriceDataError';
  }
}
