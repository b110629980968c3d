export interface SummaryRow {
  period: string;
  start: string;
  end: string;
  buys: number;
  sells: number;
  cumulativeReturn: string;
  maxDrawdown: string;
  dailyWinRate: string;
  totalTrades: number;
  finalPositionValue: string;
  /** Which of the columns hold the best value across periods */
  best: string;
}
