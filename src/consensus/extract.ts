import type { ExtractedSignal } from "./types.js";

/**
 * Fact fields read as the engine's directional call, highest precedence
 * first. The first field holding a recognized value wins; a field with an
 * unrecognized value is skipped, not treated as neutral.
 */
export const SIGNAL_FIELDS = ["signal", "position_bias", "primary_trend", "momentum"] as const;

export const CONFIDENCE_FIELDS = ["confidence", "strength", "quality_score"] as const;

/** Confidence used when an engine gives a direction but no confidence. */
export const DEFAULT_CONFIDENCE = 0.5;

const SIGNAL_VOCABULARY: ReadonlyMap<string, number> = new Map([
  ["strong_bullish", 0.85],
  ["strong_buy", 0.85],
  ["bullish", 0.5],
  ["buy", 0.5],
  ["long", 0.5],
  ["neutral", 0],
  ["hold", 0],
  ["bearish", -0.5],
  ["sell", -0.5],
  ["short", -0.5],
  ["strong_bearish", -0.85],
  ["strong_sell", -0.85],
]);

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** "Strong Bullish", "strong-bullish" and "STRONG_BULLISH" are the same word. */
function normalizeTerm(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export function scoreValue(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? clamp(value, -1, 1) : null;
  }
  if (typeof value === "string") {
    return SIGNAL_VOCABULARY.get(normalizeTerm(value)) ?? null;
  }
  return null;
}

/** 0–1 as given; (1, 100] is read as a percentage. */
export function confidenceValue(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  const scaled = value > 1 && value <= 100 ? value / 100 : value;
  return clamp(scaled, 0, 1);
}

export function extractSignal(facts: Readonly<Record<string, unknown>>): ExtractedSignal {
  for (const field of SIGNAL_FIELDS) {
    if (!(field in facts)) continue;
    const score = scoreValue(facts[field]);
    if (score === null) continue;

    let confidence = DEFAULT_CONFIDENCE;
    for (const confField of CONFIDENCE_FIELDS) {
      const c = confidenceValue(facts[confField]);
      if (c !== null) {
        confidence = c;
        break;
      }
    }
    return { score, confidence, source: field };
  }

  return { score: 0, confidence: 0, source: null };
}
