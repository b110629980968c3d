export type Tag =
  | 'init'
  | 'configuration'
  | 'backtest'
  | 'fetcher'
  | 'price provider'
  | 'cache'
  | 'pipeline'
  | 'reporter';
