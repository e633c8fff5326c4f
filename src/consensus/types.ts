import type { ReliabilityLevel } from "../engine/types.js";

export type ConsensusSignal =
  | "strong_bearish"
  | "bearish"
  | "neutral"
  | "bullish"
  | "strong_bullish"
  | "insufficient_data";

export type ConsensusQuality = "high" | "medium" | "low" | "insufficient";

export type SignalBucket = "bullish" | "bearish" | "neutral";

export interface ExtractedSignal {
  /** [-1, 1] */
  score: number;
  /** [0, 1] */
  confidence: number;
  /** Fact field the score came from, null when none was recognized. */
  source: string | null;
}

export interface EngineContribution {
  signal: SignalBucket;
  score: number;
  confidence: number;
  /** reliability weight × confidence */
  weight: number;
  reliability: ReliabilityLevel;
}

export interface ConsensusResult {
  signal: ConsensusSignal;
  confidence: number;
  strength: number;
  quality: ConsensusQuality;
  enginesAnalyzed: number;
  enginesBullish: number;
  enginesBearish: number;
  enginesNeutral: number;
  reliabilityAverage: number;
  weightedScore: number;
  engineContributions: Record<string, EngineContribution>;
}

export interface ConsensusInput {
  engine: string;
  reliability: ReliabilityLevel;
  facts: Readonly<Record<string, unknown>>;
}
