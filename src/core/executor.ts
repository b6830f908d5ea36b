import pino from 'pino';
import { withTrade } from './cooldown';
import type { OrderGateway } from './collaborators';
import type { BoundedIntent, CooldownState, ExecutionMode, OrderResult, Side } from './types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export interface ExecutionOptions {
  mode: ExecutionMode;
  gateway: OrderGateway;
  cooldowns: CooldownState;
  clock: () => number;
}

export interface ExecutionOutcome {
  results: OrderResult[];
  cooldowns: CooldownState;
}

/** Sells first so their proceeds and reduced exposure land before any buy. */
export function buildExecutionPlan<T extends { side: Side }>(intents: readonly T[]): T[] {
  return [...intents.filter((i) => i.side === 'SELL'), ...intents.filter((i) => i.side === 'BUY')];
}

function planned(intent: BoundedIntent): Omit<OrderResult, 'status' | 'filledQuantity' | 'orderId'> {
  return {
    symbol: intent.symbol,
    side: intent.side,
    requested: intent.size,
    quantity: intent.quantity,
    notional: intent.notional,
  };
}

export async function executePlan(
  plan: readonly BoundedIntent[],
  opts: ExecutionOptions,
): Promise<ExecutionOutcome> {
  const results: OrderResult[] = [];
  let cooldowns = opts.cooldowns;

  if (opts.mode === 'MONITOR') {
    for (const intent of plan) {
      logger.info({ symbol: intent.symbol, side: intent.side, quantity: intent.quantity }, 'monitor: order not sent');
      results.push({ ...planned(intent), status: 'SIMULATED', filledQuantity: intent.quantity, orderId: null });
    }
    return { results, cooldowns };
  }

  const mode = opts.mode;
  // one at a time: every quota was computed against the same account snapshot
  for (const intent of plan) {
    try {
      const ack = await opts.gateway.submit({
        symbol: intent.symbol,
        side: intent.side,
        quantity: intent.quantity,
        mode,
      });
      cooldowns = withTrade(cooldowns, intent.symbol, opts.clock());
      logger.info({ symbol: intent.symbol, side: intent.side, mode, orderId: ack.orderId }, 'order submitted');
      results.push({ ...planned(intent), status: 'SUBMITTED', filledQuantity: ack.filledQuantity, orderId: ack.orderId });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      logger.error({ err, symbol: intent.symbol, side: intent.side, mode }, 'order failed');
      results.push({
        ...planned(intent),
        status: 'FAILED',
        filledQuantity: null,
        orderId: null,
        reason: 'SUBMIT_FAILED',
        detail,
      });
    }
  }
  return { results, cooldowns };
}
