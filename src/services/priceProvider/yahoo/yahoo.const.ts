export const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

export const YAHOO_HEADERS = { 'User-Agent': 'Mozilla/5.0 (compatible; gridlab)' } as const;

export const YAHOO_NOT_FOUND_CODE = 'Not Found';

/** Start of the chart error description Yahoo sends for a range without bars */
export const YAHOO_NO_DATA_DESCRIPTION = "Data doesn't exist";
