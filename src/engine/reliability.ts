import type { ReliabilityLevel } from "./types.js";

export const RELIABILITY_LEVELS: readonly ReliabilityLevel[] = ["experimental", "variable", "medium", "high"];

export const RELIABILITY_WEIGHTS: Readonly<Record<ReliabilityLevel, number>> = {
  experimental: 0.3,
  variable: 0.5,
  medium: 0.7,
  high: 1.0,
};

export function reliabilityWeight(level: ReliabilityLevel): number {
  return RELIABILITY_WEIGHTS[level];
}

export function meetsReliability(level: ReliabilityLevel, floor: ReliabilityLevel): boolean {
  return RELIABILITY_LEVELS.indexOf(level) >= RELIABILITY_LEVELS.indexOf(floor);
}
