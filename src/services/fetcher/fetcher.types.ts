type RequestFetch = {
  url: string;
  headers?: Record<string, string>;
  retries?: number;
  attempt?: number;
};

/** Resolves with the parsed JSON body (or the raw text), left for the caller to validate. */
export type Request = ({ url, headers, attempt, retries }: RequestFetch) => Promise<unknown>;

export type Fetcher = {
  get: Request;
};
