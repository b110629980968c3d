import { SymbolEntry } from './symbolDirectory.types';

export const DEFAULT_SYMBOL = '510300.SS';

export const SYMBOL_DIRECTORY: readonly SymbolEntry[] = [
  { name: '沪深300ETF', alias: 'CSI 300 ETF', symbol: '510300.SS' },
  { name: '贵州茅台', alias: 'Kweichow Moutai', symbol: '600519.SS' },
  { name: '宁德时代', alias: 'CATL', symbol: '300750.SZ' },
  { name: '招商银行', alias: 'China Merchants Bank', symbol: '600036.SS' },
  { name: '中国平安', alias: 'Ping An Insurance', symbol: '601318.SS' },
  { name: '五粮液', alias: 'Wuliangye', symbol: '000858.SZ' },
  { name: '中芯国际', alias: 'SMIC', symbol: '688981.SS' },
  { name: '比亚迪', alias: 'BYD', symbol: '002594.SZ' },
  { name: '东方财富', alias: 'East Money', symbol: '300059.SZ' },
  { name: '上证指数', alias: 'SSE Composite Index', symbol: '000001.SS' },
];
