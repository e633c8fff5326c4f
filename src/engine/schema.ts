import { z } from "zod";
import type { ResultEnvelope } from "./types.js";

const unitInterval = z.number().min(0).max(1);

export const ReliabilityLevelSchema = z.enum(["experimental", "variable", "medium", "high"]);
export const EngineTypeSchema = z.enum(["traditional", "scanner", "hybrid"]);

export const QualityMetaSchema = z.object({
  sampleSize: z.number().nonnegative().optional(),
  freshnessSec: z.number().nonnegative().optional(),
  dataCompleteness: unitInterval.optional(),
  falsePositiveRisk: unitInterval.optional(),
  manipulationSensitivity: unitInterval.optional(),
  historicalValidationYears: z.number().nonnegative().optional(),
});

export const ResultEnvelopeSchema = z.object({
  engine: z.string().min(1),
  timeframe: z.string().min(1),
  asOf: z.date(),
  facts: z.record(z.unknown()),
  quality: QualityMetaSchema,
});

/**
 * Validate what an engine resolved with. Engines are external code, so their
 * output is checked before it is accepted as a success outcome.
 */
export function parseEnvelope(value: unknown): { ok: true; envelope: ResultEnvelope } | { ok: false; error: string } {
  const parsed = ResultEnvelopeSchema.safeParse(value);
  if (parsed.success) {
    return { ok: true, envelope: parsed.data };
  }
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return { ok: false, error: `Malformed envelope: ${issues}` };
}
