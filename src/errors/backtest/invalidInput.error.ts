import { BacktestError } from './backtest.error';

export class InvalidInputError extends BacktestError {
  constructor(message: string) {
    super(`Invalid input: ${message}`);
    this.name = 'InvalidInputError';
  }
}
