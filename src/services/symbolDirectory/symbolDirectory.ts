import { find, toLower, trim } from 'lodash-es';
import { SYMBOL_DIRECTORY } from './symbolDirectory.const';
import { SymbolEntry } from './symbolDirectory.types';

/** First directory entry whose name or alias contains the query (alias match is case-insensitive). */
export const searchSymbol = (
  query: string,
  directory: readonly SymbolEntry[] = SYMBOL_DIRECTORY,
): SymbolEntry | undefined => {
  const needle = trim(query);
  if (!needle) return;
  const lowerNeedle = toLower(needle);
  return find(directory, ({ name, alias }) => name.includes(needle) || toLower(alias).includes(lowerNeedle));
};
