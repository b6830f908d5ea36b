import { seriesFeatures } from './prompts';
import { baseAsset } from '../core/symbols';
import type { DecisionModel } from '../core/collaborators';

/**
 * Deterministic stand-in: buys the symbol with the strongest positive range
 * change, sells the weakest one it holds.
 */
export function createMockAdapter(id: string, quoteAsset = 'USDT'): DecisionModel {
  return {
    id,
    async decide({ prices, history, balances, maxTradeQuote }) {
      const ranked = Object.keys(prices)
        .map((symbol) => ({ symbol, change: seriesFeatures(history[symbol] ?? []).change ?? 0 }))
        .sort((a, b) => b.change - a.change);
      const best = ranked[0];
      const worst = ranked[ranked.length - 1];

      const buys: unknown[] = best && best.change > 0 ? [{ symbol: best.symbol, quote_usdt: maxTradeQuote }] : [];
      const sells: unknown[] = [];
      if (worst && worst.change < 0) {
        const held = balances[baseAsset(worst.symbol, quoteAsset)] ?? 0;
        if (held > 0) sells.push({ symbol: worst.symbol, quantity: held });
      }
      return { kind: 'combo', buys, sells, confidence: 0.7, rationale: 'mock: range momentum', fallback: null };
    },
  };
}
