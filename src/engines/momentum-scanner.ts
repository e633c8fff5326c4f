import { defineEngine, delay } from "../engine/define.js";

export function createMomentumScannerEngine() {
  return defineEngine({
    name: "Momentum Scanner",
    type: "scanner",
    reliability: "variable",
    description: "Rate-of-change momentum scan (sample data)",
    async analyze(_request, { signal, report }) {
      report("scan", 50, "Scanning rate of change");
      await delay(80, signal);
      report("score", 100);

      return {
        facts: {
          momentum: "neutral",
          quality_score: 0.6,
          rate_of_change: 0.4,
        },
        quality: {
          sampleSize: 120,
          freshnessSec: 15,
          falsePositiveRisk: 0.35,
          manipulationSensitivity: 0.5,
        },
      };
    },
  });
}
