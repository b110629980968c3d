const percentFormatters = new Map<number, Intl.NumberFormat>();

const getPercentFormatter = (decimals: number) => {
  const cached = percentFormatters.get(decimals);
  if (cached) return cached;
  const formatter = new Intl.NumberFormat('en-US', {
    style: 'percent',
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
    useGrouping: false,
  });
  percentFormatters.set(decimals, formatter);
  return formatter;
};

const amountFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Formats a ratio (0.1234) as a percentage string ("12.34%"). */
export const formatPercent = (ratio: number | null | undefined, decimals = 2): string => {
  if (ratio === null || ratio === undefined || !Number.isFinite(ratio)) return 'n/a';
  return getPercentFormatter(decimals).format(ratio);
};

/** Formats a currency amount with thousands separators and no decimals. */
export const formatAmount = (value: number | null | undefined): string => {
  if (value === null || value === undefined || !Number.isFinite(value)) return 'n/a';
  return amountFormatter.format(value);
};
