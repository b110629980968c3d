/**
 * @fileoverview Statistics derived from a daily price series or equity trajectory.
 * All functions are pure and scan their input strictly left to right, so that
 * repeated runs round identically.
 */

// ============================================================================
// PRICE CHANGES
// ============================================================================

/**
 * Calculates day-over-day relative changes.
 * The first day has no predecessor and is given a change of 0.
 *
 * @param prices - Closing prices in chronological order
 * @returns One change per price (e.g. -0.01 for a 1% drop)
 */
export const calculateDailyChanges = (prices: readonly number[]): number[] =>
  prices.map((price, index) => (index === 0 ? 0 : (price - prices[index - 1]) / prices[index - 1]));

// ============================================================================
// RETURN CALCULATIONS
// ============================================================================

/**
 * Calculates the cumulative return of deployed capital.
 *
 * @param finalEquity - Last value of the equity trajectory
 * @param totalInvested - Total notional spent on buys
 * @returns Return as a ratio (-0.25 for -25%), or 0 when nothing was invested
 */
export const calculateCumulativeReturn = (finalEquity: number, totalInvested: number): number => {
  if (totalInvested <= 0) return 0;
  return finalEquity / totalInvested - 1;
};

// ============================================================================
// WIN RATE
// ============================================================================

/**
 * Calculates the share of day-over-day steps where equity strictly increased.
 *
 * @param equity - Equity trajectory in chronological order
 * @returns Ratio in [0, 1], 0 when there is no step to compare
 */
export const calculateDailyWinRate = (equity: readonly number[]): number => {
  if (equity.length <= 1) return 0;

  let wins = 0;
  for (let i = 1; i < equity.length; i++) {
    if (equity[i] > equity[i - 1]) wins++;
  }

  return wins / (equity.length - 1);
};

// ============================================================================
// RISK METRICS
// ============================================================================

/**
 * Computes the running maximum of a trajectory (prefix maximum).
 */
export const calculateRunningPeaks = (equity: readonly number[]): number[] => {
  const peaks: number[] = [];
  let peak = -Infinity;
  for (const value of equity) {
    if (value > peak) peak = value;
    peaks.push(peak);
  }
  return peaks;
};

/**
 * Calculates the maximum drawdown of an equity trajectory.
 * A day whose running peak is not positive has no relative drawdown and is ignored.
 *
 * @param equity - Equity trajectory in chronological order
 * @returns Deepest relative decline from the running peak, as a ratio <= 0
 */
export const calculateMaxDrawdown = (equity: readonly number[]): number => {
  const peaks = calculateRunningPeaks(equity);

  let maxDrawdown = 0;
  for (let i = 0; i < equity.length; i++) {
    const peak = peaks[i];
    if (peak <= 0) continue;
    const drawdown = (equity[i] - peak) / peak;
    if (drawdown < maxDrawdown) maxDrawdown = drawdown;
  }

  return maxDrawdown;
};
