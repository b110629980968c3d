import { DataUnavailableError } from './dataUnavailable.error';

export class PriceProviderNetworkError extends DataUnavailableError {
  constructor(symbol: string, cause: string) {
    super(`Unable to reach price provider for ${symbol}: ${cause}`);
    this.name = 'PriceProviderNetworkError';
  }
}
