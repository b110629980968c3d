export const FETCHER_MAX_RETRIES = 3;
export const FETCHER_RETRY_DELAY = 1000;
/** Client errors that are worth another attempt: request timeout and rate limiting */
export const FETCHER_RETRYABLE_STATUSES: ReadonlyArray<number> = [408, 429];
