import pino from 'pino';
import { buildExecutionPlan, executePlan } from './executor';
import { applyExchangeFilter } from './filters';
import { QuotaLedger, clampToQuota } from './quota';
import { evaluateRiskGate } from './riskGate';
import { sanitizeDecision } from './sanitizer';
import { skipped } from './types';
import type { OrderGateway } from './collaborators';
import type {
  AccountState,
  BoundedIntent,
  CooldownState,
  CycleConfig,
  ExchangeFilter,
  MarketSnapshot,
  OrderResult,
  RawDecision,
} from './types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export interface CycleInput {
  decision: RawDecision;
  market: MarketSnapshot;
  account: AccountState;
  filters: Record<string, ExchangeFilter>;
  cooldowns: CooldownState;
  config: CycleConfig;
  gateway: OrderGateway;
  clock?: () => number;
}

export interface CycleOutcome {
  results: OrderResult[];
  cooldowns: CooldownState;
}

export function validPriceSymbols(market: MarketSnapshot): Set<string> {
  const out = new Set<string>();
  for (const [symbol, entry] of Object.entries(market)) {
    if (Number.isFinite(entry.price) && entry.price > 0) out.add(symbol);
  }
  return out;
}

/**
 * One decision cycle: sanitize, gate, filter, clamp, execute.
 * Returns a result per model entry and the cooldown state to carry forward.
 */
export async function runCycle(input: CycleInput): Promise<CycleOutcome> {
  const clock = input.clock ?? Date.now;
  const { config, market } = input;
  const ledger = new QuotaLedger(input.account);
  const now = clock();

  const { intents, rejected } = sanitizeDecision(input.decision, {
    validSymbols: validPriceSymbols(market),
    tradingSymbols: new Set(config.tradingSymbols),
    quoteAsset: config.quoteAsset,
    singleBuyNotional: config.maxTradeQuote,
    heldQuantity: (symbol) => ledger.heldQuantity(symbol),
  });
  const results: OrderResult[] = [...rejected];
  for (const r of rejected) logger.info({ symbol: r.symbol, side: r.side, detail: r.detail }, 'skip: malformed entry');

  const bounded: BoundedIntent[] = [];
  for (const intent of intents) {
    const entry = market[intent.symbol];
    const gate = evaluateRiskGate(intent, entry, input.cooldowns, config, now);
    if (!gate.pass) {
      logger.info({ symbol: intent.symbol, side: intent.side, detail: gate.detail }, 'skip: risk gate');
      results.push(skipped(intent.symbol, intent.side, intent.size, 'GATE_REJECTED', gate.detail));
      continue;
    }

    const filtered = applyExchangeFilter(intent, entry?.price ?? 0, input.filters[intent.symbol]);
    if (!filtered.ok) {
      logger.info({ symbol: intent.symbol, side: intent.side, detail: filtered.detail }, 'skip: exchange filter');
      results.push(skipped(intent.symbol, intent.side, intent.size, 'FILTER_REJECTED', filtered.detail));
      continue;
    }

    const clamped = clampToQuota(filtered.intent, ledger, config, filtered.filter);
    if (!clamped.ok) {
      logger.info({ symbol: intent.symbol, side: intent.side, detail: clamped.detail }, 'skip: quota');
      results.push(skipped(intent.symbol, intent.side, intent.size, clamped.reason, clamped.detail));
      continue;
    }
    bounded.push(clamped.intent);
  }

  const executed = await executePlan(buildExecutionPlan(bounded), {
    mode: config.mode,
    gateway: input.gateway,
    cooldowns: input.cooldowns,
    clock,
  });

  return { results: buildExecutionPlan([...results, ...executed.results]), cooldowns: executed.cooldowns };
}
