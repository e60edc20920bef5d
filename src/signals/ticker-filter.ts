import excluded from './excluded-tickers.json';

// Acronyms, indices and funds that show up in free-text sources but are not
// individual equities.
const EXCLUDED = new Set<string>([...excluded.acronyms, ...excluded.indices, ...excluded.funds]);

const MIN_TICKER_LENGTH = 3;

export function normalizeTicker(raw: string): string {
  return raw.trim().toUpperCase().replace(/^\$/, '');
}

export function isNoiseTicker(ticker: string): boolean {
  const upper = normalizeTicker(ticker);
  return upper.length < MIN_TICKER_LENGTH || EXCLUDED.has(upper);
}
