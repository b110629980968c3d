import { DataUnavailableError } from './dataUnavailable.error';

export class UnknownSymbolError extends DataUnavailableError {
  constructor(symbol: string) {
    super(`Unknown symbol: ${symbol}`);
    this.name = 'UnknownSymbolError';
  }
}
