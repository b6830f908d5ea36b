export const DEFAULT_QUOTE_ASSET = 'USDT';

/**
 * Canonical BASE+QUOTE pair id. Accepts `btc`, `BTC/USDT`, `btc-usdt`.
 * Returns null when nothing alphanumeric is left.
 */
export function resolveSymbol(raw: unknown, quoteAsset = DEFAULT_QUOTE_ASSET): string | null {
  if (typeof raw !== 'string') return null;
  const s = raw.trim().toUpperCase().replace(/[\s/_-]/g, '');
  if (!s || !/^[A-Z0-9]+$/.test(s)) return null;
  if (s === 'NULL' || s === 'NONE') return null;
  const quote = quoteAsset.toUpperCase();
  return s.endsWith(quote) ? s : `${s}${quote}`;
}

export function baseAsset(symbol: string, quoteAsset = DEFAULT_QUOTE_ASSET): string {
  const quote = quoteAsset.toUpperCase();
  return symbol.endsWith(quote) ? symbol.slice(0, -quote.length) : symbol;
}

export function resolveSymbolList(list: string, quoteAsset = DEFAULT_QUOTE_ASSET): string[] {
  const out: string[] = [];
  for (const part of list.split(',')) {
    const sym = resolveSymbol(part, quoteAsset);
    if (sym && !out.includes(sym)) out.push(sym);
  }
  return out;
}
