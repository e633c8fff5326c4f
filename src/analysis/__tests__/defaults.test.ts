import { describe, it, expect } from "vitest";
import { createDefaultService } from "../defaults.js";
import { quickAnalysis, consensusOnly } from "../quick.js";

describe("default engine set", () => {
  it("registers the sample engines in order", () => {
    const service = createDefaultService();
    expect(service.availableEngines().map((e) => [e.name, e.type, e.reliability])).toEqual([
      ["Dow Theory", "traditional", "high"],
      ["Wyckoff Method", "traditional", "medium"],
      ["Momentum Scanner", "scanner", "variable"],
    ]);
  });

  it("creates an independent registry per service", () => {
    const a = createDefaultService();
    const b = createDefaultService();
    a.registry.unregister("Dow Theory");
    expect(b.registry.has("Dow Theory")).toBe(true);
  });

  it("quickAnalysis runs every default engine with consensus", async () => {
    const result = await quickAnalysis("SPY", "4H");

    expect(result.successfulEngines).toBe(3);
    expect(result.engineResults.map((o) => o.engine)).toEqual(["Dow Theory", "Wyckoff Method", "Momentum Scanner"]);
    // (0.5·0.85 + 0.5·0.455 + 0·0.3) / 1.605
    expect(result.consensus?.weightedScore).toBeCloseTo(0.40654, 4);
    expect(result.consensus?.signal).toBe("bullish");
    // confidence 1.605 / 3 = 0.535, reliability 2.2 / 3 ≈ 0.733
    expect(result.consensus?.confidence).toBeCloseTo(0.535, 10);
    expect(result.consensus?.quality).toBe("medium");
    expect(result.consensus?.enginesNeutral).toBe(1);
  });

  it("quickAnalysis can skip consensus", async () => {
    const result = await quickAnalysis("SPY", "1D", false);
    expect(result.consensus).toBeUndefined();
  });

  it("consensusOnly honours the reliability floor", async () => {
    const consensus = await consensusOnly("TSLA", "1D", "medium");

    expect(consensus.enginesAnalyzed).toBe(2);
    expect(consensus.signal).toBe("bullish");
    // two included engines cannot grade higher than medium
    expect(consensus.quality).toBe("medium");
  });
});
