import { GridlabError } from '@errors/gridlab.error';

/** Nothing usable came back from the price provider for a symbol and range. */
export class DataUnavailableError extends GridlabError {
  constructor(message: string) {
    super('price provider', message);
    this.name = 'DataUnavailableError';
  }
}
