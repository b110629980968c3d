import { InvalidDateRangeError } from '@errors/invalidDateRange.error';
import { Period, PeriodDefinition, ViewMode } from '@models/period.types';
import { isDaterangeValid, startOfUTCDay, toISODate, toTimestamp } from '@utils/date/date.utils';
import { PERIOD_PRESETS } from './period.const';

/**
 * Turns a view mode into concrete date ranges.
 * An open-ended period runs until the start of `now`'s day, end excluded.
 */
export const resolvePeriods = (
  view: ViewMode,
  now: EpochTimeStamp,
  customPeriods: readonly PeriodDefinition[] = [],
): Period[] => {
  const definitions = view === 'custom' ? customPeriods : PERIOD_PRESETS[view];
  const today = startOfUTCDay(now);

  return definitions.map(({ label, start, end }) => {
    const period = { label, start: toTimestamp(start), end: end ? toTimestamp(end) : today };
    if (!isDaterangeValid(period.start, period.end))
      throw new InvalidDateRangeError(label, start, end ?? toISODate(today));
    return period;
  });
};
