import { error, warning } from '@services/logger';
import { wait } from '@utils/process/process.utils';
import { FETCHER_MAX_RETRIES, FETCHER_RETRY_DELAY, FETCHER_RETRYABLE_STATUSES } from './fetcher.const';
import { FetcherError } from './fetcher.error';
import { Fetcher, Request } from './fetcher.types';

/** A 4xx answer that a retry would only repeat */
export const isClientError = (err: unknown): err is FetcherError =>
  err instanceof FetcherError &&
  err.status !== undefined &&
  err.status >= 400 &&
  err.status < 500 &&
  !FETCHER_RETRYABLE_STATUSES.includes(err.status);

const request: Request = async ({ url, headers, attempt = 0, retries = FETCHER_MAX_RETRIES }) => {
  try {
    const response = await fetch(url, headers ? { headers } : undefined).catch((err: unknown) => {
      throw new FetcherError(err instanceof Error ? err.message : String(err));
    });

    const contentType = response.headers.get('Content-Type');
    const isJson = contentType && contentType.includes('application/json');
    const data = isJson ? await response.json() : await response.text();

    if (!response.ok) {
      const errorDetails = typeof data === 'string' ? data : JSON.stringify(data);
      const message = `HTTP ${response.status} ${response.statusText}: ${errorDetails}`;
      throw new FetcherError(message, response.status, data);
    }

    return data;
  } catch (err) {
    if (attempt >= retries || isClientError(err)) {
      if (err instanceof Error) error('fetcher', err.message);
      throw err;
    }

    warning('fetcher', `Attempt ${attempt + 1} on ${url} failed, retrying`);
    await wait(FETCHER_RETRY_DELAY * (attempt + 1));
    return request({ url, headers, retries, attempt: attempt + 1 });
  }
};

export const fetcher: Fetcher = { get: request };
