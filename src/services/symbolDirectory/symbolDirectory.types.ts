export interface SymbolEntry {
  /** Listed company or fund name */
  name: string;
  /** Romanized or English alias */
  alias: string;
  /** Yahoo Finance ticker, suffixed with the exchange (.SS Shanghai, .SZ Shenzhen) */
  symbol: string;
}
