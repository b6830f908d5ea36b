import { describe, expect, it } from 'vitest';
import { buildDecisionPrompt, seriesFeatures, summarizeMemory } from './prompts';
import type { DecisionContext, JournalEntry } from '../core/collaborators';

const context: DecisionContext = {
  prices: { BTCUSDT: 100, ETHUSDT: 20 },
  history: { BTCUSDT: [100, 110, 99] },
  balances: { USDT: 50, ETH: 0.5 },
  quoteAsset: 'USDT',
  quoteFree: 50,
  maxTradeQuote: 20,
  maxPositionQuotePerSymbol: 50,
  minConfidence: 0.65,
  memory: [],
};

const entry: JournalEntry = {
  ts: 0,
  model: 'mock',
  mode: 'MONITOR',
  decision: { kind: 'combo', buys: [], sells: [], confidence: 0.7, rationale: '', fallback: null },
  results: [
    {
      symbol: 'BTCUSDT',
      side: 'BUY',
      requested: { kind: 'notional', value: 20 },
      quantity: 0.2,
      notional: 20,
      filledQuantity: 0.2,
      orderId: null,
      status: 'SIMULATED',
    },
  ],
};

describe('seriesFeatures', () => {
  it('describes range change and last momentum', () => {
    const f = seriesFeatures([100, 110, 99]);
    expect(f.change).toBeCloseTo(-0.01, 10);
    expect(f.lastMomentum).toBeCloseTo(-0.1, 10);
    expect(f.meanReturn).toBeCloseTo(0, 10);
  });

  it('has nothing to say about an empty series', () => {
    expect(seriesFeatures([])).toEqual({ change: null, meanReturn: null, volatility: null, lastMomentum: null });
  });
});

describe('summarizeMemory', () => {
  it('lists plan results per side', () => {
    expect(summarizeMemory(entry)).toBe('- [1970-01-01T00:00:00.000Z] mock plan buys=BTCUSDT:SIMULATED sells=[]');
  });
});

describe('buildDecisionPrompt', () => {
  it('lays out prices, balances and limits', () => {
    const lines = buildDecisionPrompt(context).split('\n');
    expect(lines).toContain('- BTCUSDT: 100');
    expect(lines).toContain('- ETHUSDT: history unavailable');
    expect(lines).toContain('- ETH: 0.5');
    expect(lines).toContain('- USDT available for buys: 50.0000');
    expect(lines).toContain('- limits: per buy <= 20.00 USDT, per symbol position <= 50.00 USDT');
    expect(lines).toContain('- If confidence is below 0.65, return empty lists or HOLD.');
    expect(lines).not.toContain('Recent cycles:');
  });

  it('appends recent cycles when memory is present', () => {
    const lines = buildDecisionPrompt({ ...context, memory: [entry] }).split('\n');
    const at = lines.indexOf('Recent cycles:');
    expect(at).toBeGreaterThan(0);
    expect(lines[at + 1]).toBe(summarizeMemory(entry));
  });
});
