import { cooldownRemainingMs } from './cooldown';
import type { CooldownState, Intent, MarketEntry, RiskThresholds } from './types';

export type GateVerdict = { pass: true } | { pass: false; detail: string };

const fmt = (n: number, digits = 2) => n.toFixed(digits);

/**
 * Hard AND of every predicate; the first failing one is reported.
 * A null indicator (not enough history) does not block.
 */
export function evaluateRiskGate(
  intent: Intent,
  entry: MarketEntry | undefined,
  cooldowns: CooldownState,
  thresholds: RiskThresholds,
  now: number,
): GateVerdict {
  if (!entry) return { pass: false, detail: 'no market data' };

  const { volatility, rsi } = entry;
  if (volatility !== null && volatility > thresholds.maxVolatility) {
    return {
      pass: false,
      detail: `volatility ${fmt(volatility * 100)}% > ${fmt(thresholds.maxVolatility * 100)}%`,
    };
  }

  const remaining = cooldownRemainingMs(cooldowns, intent.symbol, now, thresholds.cooldownSec);
  if (remaining > 0) {
    return { pass: false, detail: `cooldown ${Math.ceil(remaining / 1000)}s remaining` };
  }

  if (intent.side === 'BUY') {
    if (rsi !== null && rsi > thresholds.rsiBuyMax) {
      return { pass: false, detail: `RSI ${fmt(rsi)} > ${fmt(thresholds.rsiBuyMax)}` };
    }
    if (intent.confidence !== null && intent.confidence < thresholds.minConfidenceBuy) {
      return { pass: false, detail: `confidence ${fmt(intent.confidence)} < ${fmt(thresholds.minConfidenceBuy)}` };
    }
  } else {
    if (rsi !== null && rsi < thresholds.rsiSellMin) {
      return { pass: false, detail: `RSI ${fmt(rsi)} < ${fmt(thresholds.rsiSellMin)}` };
    }
    if (intent.confidence !== null && intent.confidence < thresholds.minConfidenceSell) {
      return { pass: false, detail: `confidence ${fmt(intent.confidence)} < ${fmt(thresholds.minConfidenceSell)}` };
    }
  }

  return { pass: true };
}
