export type {
  AnalysisEngine,
  AnalysisRequest,
  EngineCancelled,
  EngineFailure,
  EngineOutcome,
  EngineProgress,
  EngineRunContext,
  EngineSuccess,
  EngineTimeout,
  EngineType,
  Facts,
  ProgressSink,
  QualityMeta,
  ReliabilityLevel,
  ResultEnvelope,
} from "./engine/types.js";
export { createRequest, isSuccess } from "./engine/types.js";
export { RELIABILITY_LEVELS, RELIABILITY_WEIGHTS, reliabilityWeight, meetsReliability } from "./engine/reliability.js";
export { DuplicateNameError, EngineNotFoundError, EngineTimeoutError, AnalysisCancelledError } from "./engine/errors.js";
export { defineEngine, delay, type EngineDefinition } from "./engine/define.js";
export { createRegistry, type EngineRegistry, type EngineInfo } from "./engine/registry.js";
export { runAll, runEngine, type RunOptions } from "./engine/scheduler.js";
export { computeConsensus, scoreToSignal, gradeQuality, type ConsensusOptions } from "./consensus/analyzer.js";
export { extractSignal, SIGNAL_FIELDS, CONFIDENCE_FIELDS } from "./consensus/extract.js";
export type {
  ConsensusQuality,
  ConsensusResult,
  ConsensusSignal,
  EngineContribution,
} from "./consensus/types.js";
export {
  createAnalysisService,
  type AnalysisResult,
  type AnalysisService,
  type AnalyzeOptions,
  type RunAllOptions,
} from "./analysis/service.js";
export { createDefaultService } from "./analysis/defaults.js";
export { quickAnalysis, consensusOnly } from "./analysis/quick.js";
export { defaultEngines } from "./engines/index.js";
export { createApp, startRestServer } from "./rest/server.js";
