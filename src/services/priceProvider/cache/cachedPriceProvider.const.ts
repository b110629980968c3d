import { ONE_DAY } from '@constants/time.const';

/** Daily bars only change once a day */
export const DEFAULT_CACHE_TTL = ONE_DAY;
