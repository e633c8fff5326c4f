import { defineEngine, delay } from "../engine/define.js";

/** Sample-data Wyckoff Method engine (accumulation/distribution phases). */
export function createWyckoffEngine() {
  return defineEngine({
    name: "Wyckoff Method",
    type: "traditional",
    reliability: "medium",
    description: "Accumulation/distribution phase detection (sample data)",
    async analyze(_request, { signal, report }) {
      report("fetch", 25, "Fetching volume data");
      await delay(100, signal);
      report("compute", 70, "Analyzing accumulation/distribution");
      await delay(150, signal);
      report("score", 100, "Identifying market phases");

      return {
        facts: {
          market_phase: "accumulation",
          position_bias: "bullish",
          strength: 0.65,
          volume_spread_analysis: "bullish",
          supply_demand_balance: "demand_exceeds_supply",
          phase_progress: 0.65,
          wyckoff_signal: "spring_test_complete",
        },
        quality: {
          sampleSize: 800,
          freshnessSec: 45,
          dataCompleteness: 0.95,
        },
      };
    },
  });
}
