import type { ReliabilityLevel } from "../engine/types.js";
import { meetsReliability, reliabilityWeight } from "../engine/reliability.js";
import { extractSignal } from "./extract.js";
import type {
  ConsensusInput,
  ConsensusQuality,
  ConsensusResult,
  ConsensusSignal,
  EngineContribution,
  SignalBucket,
} from "./types.js";
import { logConsensus } from "../logging.js";

export interface ConsensusOptions {
  /** Engines below this level are left out of the verdict entirely. */
  minReliability?: ReliabilityLevel;
}

export function bucketScore(score: number): SignalBucket {
  if (score >= 0.3) return "bullish";
  if (score <= -0.3) return "bearish";
  return "neutral";
}

export function scoreToSignal(weightedScore: number): ConsensusSignal {
  if (weightedScore >= 0.7) return "strong_bullish";
  if (weightedScore >= 0.3) return "bullish";
  if (weightedScore > -0.3) return "neutral";
  if (weightedScore > -0.7) return "bearish";
  return "strong_bearish";
}

// Sums of weights like 0.7 drift just below the threshold they should meet.
const GRADE_EPSILON = 1e-9;

function atLeast(value: number, threshold: number): boolean {
  return value >= threshold - GRADE_EPSILON;
}

export function gradeQuality(included: number, reliabilityAverage: number, confidence: number): ConsensusQuality {
  if (included === 0) return "insufficient";
  if (included >= 3 && atLeast(reliabilityAverage, 0.7) && atLeast(confidence, 0.7)) return "high";
  if (included >= 2 && atLeast(reliabilityAverage, 0.5) && atLeast(confidence, 0.5)) return "medium";
  return "low";
}

/**
 * Reduce per-engine facts into one reliability-weighted verdict.
 *
 * Each engine's weight is its reliability weight times the confidence read
 * from its facts. Zero-weight engines are counted and listed but do not
 * enter the weighted average. Consensus confidence is the mean weight of the
 * included engines, so it falls with both their confidence and reliability.
 */
export function computeConsensus(inputs: readonly ConsensusInput[], options: ConsensusOptions = {}): ConsensusResult {
  const { minReliability } = options;
  const eligible = minReliability
    ? inputs.filter((i) => meetsReliability(i.reliability, minReliability))
    : inputs;

  const contributions: [string, EngineContribution][] = [];
  let bullish = 0;
  let bearish = 0;
  let neutral = 0;
  let included = 0;
  let weightSum = 0;
  let weightedSum = 0;
  let reliabilitySum = 0;

  for (const input of eligible) {
    const { score, confidence } = extractSignal(input.facts);
    const relWeight = reliabilityWeight(input.reliability);
    const weight = relWeight * confidence;
    const bucket = bucketScore(score);

    contributions.push([input.engine, { signal: bucket, score, confidence, weight, reliability: input.reliability }]);

    if (bucket === "bullish") bullish++;
    else if (bucket === "bearish") bearish++;
    else neutral++;

    if (weight > 0) {
      included++;
      weightSum += weight;
      weightedSum += score * weight;
      reliabilitySum += relWeight;
    }
  }

  const counts = {
    enginesAnalyzed: eligible.length,
    enginesBullish: bullish,
    enginesBearish: bearish,
    enginesNeutral: neutral,
    // fromEntries defines own properties, so a name like "__proto__" stays a key
    engineContributions: Object.fromEntries(contributions),
  };

  if (included === 0 || weightSum <= 0) {
    logConsensus.info({ engines: eligible.length }, "No weighted engines — consensus insufficient");
    return {
      signal: "insufficient_data",
      confidence: 0,
      strength: 0,
      quality: "insufficient",
      reliabilityAverage: 0,
      weightedScore: 0,
      ...counts,
    };
  }

  const weightedScore = weightedSum / weightSum;
  const confidence = weightSum / included;
  const reliabilityAverage = reliabilitySum / included;
  const signal = scoreToSignal(weightedScore);
  const quality = gradeQuality(included, reliabilityAverage, confidence);

  logConsensus.info(
    { engines: eligible.length, included, weighted_score: weightedScore, confidence, quality },
    `Consensus ${signal} (${included}/${eligible.length} engines weighted)`,
  );

  return {
    signal,
    confidence,
    strength: Math.abs(weightedScore),
    quality,
    reliabilityAverage,
    weightedScore,
    ...counts,
  };
}
