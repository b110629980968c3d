/** Threshold range (in percent) worth exploring; the engine itself only requires (0, 100]. */
export const RECOMMENDED_PCT_RANGE = { min: 0.1, max: 5 } as const;

export const DEFAULT_STRATEGY_PARAMS = {
  buyDropPct: 1,
  sellRisePct: 1.5,
  tradeAmount: 1000,
} as const;
