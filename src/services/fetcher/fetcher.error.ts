import { GridlabError } from '@errors/gridlab.error';

export class FetcherError extends GridlabError {
  /** HTTP status, undefined when the request never got a response */
  public readonly status?: number;
  /** Parsed response body of a failed HTTP answer */
  public readonly body?: unknown;

  constructor(message: string, status?: number, body?: unknown) {
    super('fetcher', message);
    this.name = 'FetcherError';
    this.status = status;
    this.body = body;
  }
}
