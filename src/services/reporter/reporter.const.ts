export const SUMMARY_CSV_HEADER =
  'symbol;period;start;end;buys;sells;cumulative return;max drawdown;daily win rate;total trades;final position value\n';

export const EQUITY_CURVE_CSV_HEADER = 'date;close;change;action;shares;cash;equity\n';
