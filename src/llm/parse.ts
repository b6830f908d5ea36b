import { z } from 'zod';
import type { RawDecision, SingleForm } from '../core/types';

// Every field degrades to null instead of failing the whole response.
const responseSchema = z.object({
  buys: z.array(z.unknown()).nullish().catch(null),
  sells: z.array(z.unknown()).nullish().catch(null),
  symbol: z.string().nullish().catch(null),
  action: z.string().nullish().catch(null),
  confidence: z.union([z.number(), z.string()]).nullish().catch(null),
  rationale: z.string().nullish().catch(null),
});

function toConfidence(v: number | string | null | undefined): number | null {
  if (v === null || v === undefined || v === '') return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

/** Pulls the JSON object out of fenced or chatty model output. */
export function extractJsonObject(text: string): string | null {
  const unfenced = text.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start < 0 || end <= start) return null;
  return unfenced.slice(start, end + 1);
}

export function parseModelResponse(text: string): RawDecision {
  const json = extractJsonObject(text);
  if (!json) return { kind: 'none', reason: 'no JSON object in response' };

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    return { kind: 'none', reason: `unparseable JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = responseSchema.safeParse(value);
  if (!parsed.success) return { kind: 'none', reason: 'response is not a JSON object' };
  const r = parsed.data;

  const confidence = toConfidence(r.confidence);
  const rationale = r.rationale ?? '';
  const single: SingleForm | null =
    r.action != null || r.symbol != null
      ? { symbol: r.symbol ?? null, action: r.action ?? 'HOLD', confidence, rationale }
      : null;

  if (r.buys != null || r.sells != null) {
    return { kind: 'combo', buys: r.buys ?? [], sells: r.sells ?? [], confidence, rationale, fallback: single };
  }
  if (single) return { kind: 'single', ...single };
  return { kind: 'none', reason: 'no decision fields' };
}

export function describeDecision(decision: RawDecision): string {
  switch (decision.kind) {
    case 'none':
      return `none (${decision.reason})`;
    case 'single':
      return `${decision.action} ${decision.symbol ?? '-'} conf=${decision.confidence ?? 'n/a'}`;
    case 'combo':
      return `plan buys=${decision.buys.length} sells=${decision.sells.length} conf=${decision.confidence ?? 'n/a'}`;
  }
}
