import { simpleReturns } from '../market/indicators';
import type { DecisionContext, JournalEntry } from '../core/collaborators';

export const SYSTEM_PROMPT =
  'You are a quantitative spot-trading analyst. Reply with JSON only, no prose and no code fences. ' +
  'Prefer a portfolio plan: {"buys":[{"symbol":"<BASE>USDT","quote_usdt":<number>}],' +
  '"sells":[{"symbol":"<BASE>USDT","quantity":<number>}],"rationale":"<short>","confidence":<0.0-1.0>}. ' +
  'If you cannot produce a plan, fall back to {"symbol":"<BASE>USDT|null","action":"BUY|SELL|HOLD",' +
  '"confidence":<0.0-1.0>,"rationale":"<short>"}. Never buy and sell the same symbol. ' +
  'When confidence is low or an order would not meet the exchange minimums, return HOLD or empty lists.';

export interface SeriesFeatures {
  change: number | null;
  meanReturn: number | null;
  volatility: number | null;
  lastMomentum: number | null;
}

export function seriesFeatures(closes: number[]): SeriesFeatures {
  const first = closes[0];
  const last = closes[closes.length - 1];
  const change = closes.length >= 2 && first > 0 ? (last - first) / first : null;
  const returns = simpleReturns(closes);
  if (!returns.length) return { change, meanReturn: null, volatility: null, lastMomentum: null };
  const meanReturn = returns.reduce((a, b) => a + b, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - meanReturn) ** 2, 0) / Math.max(1, returns.length - 1);
  return { change, meanReturn, volatility: Math.sqrt(variance), lastMomentum: returns[returns.length - 1] };
}

const pct = (v: number | null) => (v === null ? 'n/a' : `${(v * 100).toFixed(2)}%`);

export function summarizeMemory(entry: JournalEntry): string {
  const ts = new Date(entry.ts).toISOString();
  const d = entry.decision;
  if (d.kind === 'combo') {
    const symbolsOf = (side: 'BUY' | 'SELL') =>
      entry.results.filter((r) => r.side === side).map((r) => `${r.symbol}:${r.status}`).join(',') || '[]';
    return `- [${ts}] ${entry.model} plan buys=${symbolsOf('BUY')} sells=${symbolsOf('SELL')}`;
  }
  if (d.kind === 'single') return `- [${ts}] ${entry.model} ${d.action} ${d.symbol ?? 'none'}`;
  return `- [${ts}] ${entry.model} no decision`;
}

export function buildDecisionPrompt(ctx: DecisionContext): string {
  const lines: string[] = [];
  lines.push('Build an executable spot portfolio adjustment from the data below.');
  lines.push('Goal: improve risk-adjusted return while keeping risk bounded; several symbols may be bought or sold.');
  lines.push('');
  lines.push(`Current prices (${ctx.quoteAsset}):`);
  for (const [symbol, price] of Object.entries(ctx.prices)) lines.push(`- ${symbol}: ${price}`);
  lines.push('');
  lines.push('Recent closes (oldest first) and features:');
  for (const symbol of Object.keys(ctx.prices)) {
    const closes = ctx.history[symbol] ?? [];
    if (!closes.length) {
      lines.push(`- ${symbol}: history unavailable`);
      continue;
    }
    const f = seriesFeatures(closes);
    const preview = closes.slice(-8).map((c) => c.toFixed(4)).join(', ');
    lines.push(
      `- ${symbol}: [${preview}] (${closes.length} points) | change ${pct(f.change)} | mean return ${pct(f.meanReturn)} | volatility ${pct(f.volatility)} | last momentum ${pct(f.lastMomentum)}`,
    );
  }
  lines.push('');
  lines.push('Account balances (free):');
  const balances = Object.entries(ctx.balances);
  if (!balances.length) lines.push('- none');
  for (const [asset, amount] of balances) lines.push(`- ${asset}: ${amount}`);
  lines.push(`- ${ctx.quoteAsset} available for buys: ${ctx.quoteFree.toFixed(4)}`);
  lines.push(
    `- limits: per buy <= ${ctx.maxTradeQuote.toFixed(2)} ${ctx.quoteAsset}, per symbol position <= ${ctx.maxPositionQuotePerSymbol.toFixed(2)} ${ctx.quoteAsset}`,
  );
  lines.push(`- typical exchange minimum notional: 5.00 ${ctx.quoteAsset} (exchange filters are final)`);
  if (ctx.memory.length) {
    lines.push('');
    lines.push('Recent cycles:');
    for (const entry of ctx.memory) lines.push(summarizeMemory(entry));
  }
  lines.push('');
  lines.push('Rules:');
  lines.push(`- quote_usdt is the ${ctx.quoteAsset} amount to spend; quantity is the base amount to sell.`);
  lines.push('- Only use symbols listed under current prices. Use empty lists when nothing should change.');
  lines.push(`- If confidence is below ${ctx.minConfidence.toFixed(2)}, return empty lists or HOLD.`);
  lines.push('- Allow for the exchange fee (about 0.1%): round buys slightly up and sells slightly down.');
  lines.push('- Total buys must not exceed the available balance plus expected sell proceeds.');
  lines.push('- Never list the same symbol in both buys and sells.');
  return lines.join('\n');
}
