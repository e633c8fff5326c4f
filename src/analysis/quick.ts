import type { ReliabilityLevel } from "../engine/types.js";
import { createRequest } from "../engine/types.js";
import type { ConsensusResult } from "../consensus/types.js";
import { config } from "../config.js";
import { createDefaultService } from "./defaults.js";
import type { AnalysisResult } from "./service.js";

/**
 * One-call analysis over the default engine set.
 */
export async function quickAnalysis(
  symbol: string,
  timeframe: string = config.analysis.defaultTimeframe,
  withConsensus: boolean = true,
): Promise<AnalysisResult> {
  return createDefaultService().analyzeWithConsensus(createRequest(symbol, timeframe), {
    enableConsensus: withConsensus,
  });
}

export async function consensusOnly(
  symbol: string,
  timeframe: string = config.analysis.defaultTimeframe,
  minReliability?: ReliabilityLevel,
): Promise<ConsensusResult> {
  return createDefaultService().quickConsensus(symbol, timeframe, minReliability);
}
