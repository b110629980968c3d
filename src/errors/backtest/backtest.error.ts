import { GridlabError } from '@errors/gridlab.error';

export class BacktestError extends GridlabError {
  constructor(message: string) {
    super('backtest', message);
    this.name = 'BacktestError';
  }
}
