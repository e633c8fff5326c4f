import { defineEngine, delay } from "../engine/define.js";

/**
 * Sample-data Dow Theory engine. Produces fixed facts after simulated fetch
 * and compute stages; it does not analyze real market data.
 */
export function createDowEngine() {
  return defineEngine({
    name: "Dow Theory",
    type: "traditional",
    reliability: "high",
    description: "Primary/secondary trend with volume confirmation (sample data)",
    async analyze(request, { signal, report }) {
      report("fetch", 20, "Fetching market data");
      await delay(100, signal);
      report("compute", 60, "Analyzing trends");
      await delay(200, signal);
      report("score", 100, "Generating scores");

      return {
        facts: {
          primary_trend: "bullish",
          secondary_trend: "corrective",
          trend_strength: 0.75,
          confidence: 0.85,
          confirmation_status: "confirmed",
          volume_confirmation: true,
          support_level: 150.25,
          resistance_level: 175.8,
          key_levels: [150.25, 162.5, 175.8],
          analysis_notes: `Dow analysis for ${request.symbol} on ${request.timeframe} timeframe`,
        },
        quality: {
          sampleSize: 1000,
          freshnessSec: 60,
          dataCompleteness: 0.98,
        },
      };
    },
  });
}
