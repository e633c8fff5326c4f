import { describe, it, expect } from "vitest";
import { extractSignal, scoreValue, confidenceValue } from "../extract.js";

describe("extractSignal", () => {
  it("prefers 'signal' over lower-precedence fields", () => {
    const result = extractSignal({ primary_trend: "bearish", signal: "strong_bullish", confidence: 0.9 });
    expect(result).toEqual({ score: 0.85, confidence: 0.9, source: "signal" });
  });

  it("falls through position_bias, primary_trend and momentum in order", () => {
    expect(extractSignal({ momentum: "bearish", position_bias: "bullish" }).source).toBe("position_bias");
    expect(extractSignal({ momentum: "bearish", primary_trend: "neutral" }).source).toBe("primary_trend");
    expect(extractSignal({ momentum: "bearish" })).toEqual({ score: -0.5, confidence: 0.5, source: "momentum" });
  });

  it("skips a recognized field whose value is not in the vocabulary", () => {
    const result = extractSignal({ signal: "spring_test_complete", primary_trend: "bearish", strength: 0.4 });
    expect(result).toEqual({ score: -0.5, confidence: 0.4, source: "primary_trend" });
  });

  it("reads numeric signals directly and clamps them", () => {
    expect(extractSignal({ signal: 0.42 }).score).toBe(0.42);
    expect(extractSignal({ signal: 3 }).score).toBe(1);
    expect(extractSignal({ signal: -7 }).score).toBe(-1);
  });

  it("returns zero score and zero confidence when nothing is recognized", () => {
    expect(extractSignal({ market_phase: "accumulation", confidence: 0.9 })).toEqual({
      score: 0,
      confidence: 0,
      source: null,
    });
    expect(extractSignal({})).toEqual({ score: 0, confidence: 0, source: null });
  });

  it("uses the confidence fields in precedence order", () => {
    expect(extractSignal({ signal: "buy", strength: 0.3, confidence: 0.7 }).confidence).toBe(0.7);
    expect(extractSignal({ signal: "buy", quality_score: 0.2, strength: 0.3 }).confidence).toBe(0.3);
    expect(extractSignal({ signal: "buy", quality_score: 0.2 }).confidence).toBe(0.2);
  });

  it("ignores a non-numeric confidence and moves to the next field", () => {
    expect(extractSignal({ signal: "sell", confidence: "high", strength: 0.6 }).confidence).toBe(0.6);
  });

  it("keeps an explicit zero confidence", () => {
    expect(extractSignal({ signal: "bullish", confidence: 0 })).toEqual({ score: 0.5, confidence: 0, source: "signal" });
  });
});

describe("scoreValue", () => {
  it("maps the vocabulary regardless of case and separators", () => {
    expect(scoreValue("Strong Bullish")).toBe(0.85);
    expect(scoreValue("strong-bearish")).toBe(-0.85);
    expect(scoreValue("BULLISH")).toBe(0.5);
    expect(scoreValue(" neutral ")).toBe(0);
    expect(scoreValue("short")).toBe(-0.5);
  });

  it("returns null for unknown values", () => {
    expect(scoreValue("sideways")).toBeNull();
    expect(scoreValue("constructor")).toBeNull();
    expect(scoreValue(true)).toBeNull();
    expect(scoreValue(Number.NaN)).toBeNull();
  });
});

describe("confidenceValue", () => {
  it("reads values above 1 as percentages", () => {
    expect(confidenceValue(87.5)).toBe(0.875);
    expect(confidenceValue(100)).toBe(1);
  });

  it("clamps out-of-range values", () => {
    expect(confidenceValue(250)).toBe(1);
    expect(confidenceValue(-0.2)).toBe(0);
  });
});
