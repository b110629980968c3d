import { ONE_DAY } from '@constants/time.const';
import { getUnixTime, isBefore, isValid, secondsToMilliseconds } from 'date-fns';
import { isNil } from 'lodash-es';

/** Formats a timestamp as an ISO calendar day (yyyy-MM-dd, UTC). */
export const toISODate = (timestamp?: EpochTimeStamp): string =>
  !isNil(timestamp) && isValid(timestamp) ? new Date(timestamp).toISOString().slice(0, 10) : 'Unknown Date';

export const toTimestamp = (isoDate?: string): EpochTimeStamp => new Date(isoDate ?? 0).getTime();

export const isDaterangeValid = (start: EpochTimeStamp, end: EpochTimeStamp) => {
  return isValid(start) && isValid(end) && isBefore(start, end);
};

/** Truncates a timestamp to midnight UTC of the same day. */
export const startOfUTCDay = (timestamp: EpochTimeStamp): EpochTimeStamp => Math.floor(timestamp / ONE_DAY) * ONE_DAY;

export const toEpochSeconds = (timestamp: EpochTimeStamp): number => getUnixTime(timestamp);

export const fromEpochSeconds = (seconds: number): EpochTimeStamp => secondsToMilliseconds(seconds);
