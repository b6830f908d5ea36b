function ema(values: number[], period: number): number {
  const k = 2 / (period + 1);
  let out = values[0];
  for (const v of values.slice(1)) out = v * k + out * (1 - k);
  return out;
}

/** EMA-smoothed RSI over the last `period` changes; null with fewer than period + 1 closes. */
export function computeRsi(closes: number[], period = 14): number | null {
  if (period < 1 || closes.length < period + 1) return null;
  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    gains.push(Math.max(change, 0));
    losses.push(Math.max(-change, 0));
  }
  const avgGain = ema(gains.slice(-period), period);
  const avgLoss = ema(losses.slice(-period), period);
  if (avgLoss === 0) return 100;
  const rsi = 100 - 100 / (1 + avgGain / avgLoss);
  return Math.max(0, Math.min(100, rsi));
}

export function simpleReturns(closes: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    if (prev <= 0) continue;
    out.push((closes[i] - prev) / prev);
  }
  return out;
}

/** Sample standard deviation of simple returns; null with fewer than 3 closes. */
export function computeVolatility(closes: number[]): number | null {
  if (closes.length < 3) return null;
  const returns = simpleReturns(closes);
  if (!returns.length) return null;
  const mean = returns.reduce((a, b) => a + b, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / Math.max(1, returns.length - 1);
  return Math.sqrt(variance);
}
