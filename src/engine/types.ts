export type ReliabilityLevel = "experimental" | "variable" | "medium" | "high";

export type EngineType = "traditional" | "scanner" | "hybrid";

export interface AnalysisRequest {
  readonly symbol: string;
  readonly timeframe: string;
  readonly asOf: Date;
}

/** Absent fields mean "unknown", never zero. */
export interface QualityMeta {
  readonly sampleSize?: number;
  readonly freshnessSec?: number;
  /** 0–1 */
  readonly dataCompleteness?: number;
  /** 0–1 */
  readonly falsePositiveRisk?: number;
  /** 0–1 */
  readonly manipulationSensitivity?: number;
  readonly historicalValidationYears?: number;
}

export type Facts = Readonly<Record<string, unknown>>;

export interface ResultEnvelope {
  readonly engine: string;
  readonly timeframe: string;
  readonly asOf: Date;
  readonly facts: Facts;
  readonly quality: QualityMeta;
}

export interface EngineProgress {
  readonly engine: string;
  readonly stage: string;
  /** 0–100 */
  readonly percent: number;
  readonly note?: string;
}

export type ProgressSink = (progress: EngineProgress) => void | Promise<void>;

export interface EngineRunContext {
  /** Aborted on per-engine timeout or when the caller cancels the analysis. */
  readonly signal: AbortSignal;
  report(stage: string, percent: number, note?: string): void;
}

export interface AnalysisEngine {
  readonly name: string;
  readonly type: EngineType;
  readonly reliability: ReliabilityLevel;
  readonly description?: string;
  /** Overrides the configured default timeout for this engine. */
  readonly timeoutMs?: number;
  run(request: AnalysisRequest, context: EngineRunContext): Promise<ResultEnvelope>;
}

interface OutcomeBase {
  readonly engine: string;
  readonly durationMs: number;
}

export interface EngineSuccess extends OutcomeBase {
  readonly status: "success";
  readonly envelope: ResultEnvelope;
}

export interface EngineFailure extends OutcomeBase {
  readonly status: "failure";
  readonly error: string;
}

export interface EngineTimeout extends OutcomeBase {
  readonly status: "timeout";
  readonly error: string;
  readonly timeoutMs: number;
}

export interface EngineCancelled extends OutcomeBase {
  readonly status: "cancelled";
  readonly error: string;
}

export type EngineOutcome = EngineSuccess | EngineFailure | EngineTimeout | EngineCancelled;

export function isSuccess(outcome: EngineOutcome): outcome is EngineSuccess {
  return outcome.status === "success";
}

export function createRequest(symbol: string, timeframe: string, asOf: Date = new Date()): AnalysisRequest {
  return Object.freeze({ symbol, timeframe, asOf: new Date(asOf.getTime()) });
}
