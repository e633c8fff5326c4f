import type {
  AnalysisEngine,
  AnalysisRequest,
  EngineOutcome,
  EngineType,
  ProgressSink,
  ReliabilityLevel,
} from "../engine/types.js";
import { createRequest, isSuccess } from "../engine/types.js";
import { createRegistry, type EngineInfo, type EngineRegistry } from "../engine/registry.js";
import { runAll as scheduleAll, runEngine as scheduleOne, type RunOptions } from "../engine/scheduler.js";
import { EngineNotFoundError } from "../engine/errors.js";
import { meetsReliability } from "../engine/reliability.js";
import { computeConsensus } from "../consensus/analyzer.js";
import type { ConsensusInput, ConsensusResult } from "../consensus/types.js";
import { config } from "../config.js";
import { logger } from "../logging.js";

const log = logger.child({ module: "analysis" });

export interface EngineSelection {
  /** Explicit engines to run; an unknown name is a configuration error. */
  engineNames?: readonly string[];
  engineTypes?: readonly EngineType[];
  /** Engines below this level are not scheduled at all. */
  minReliability?: ReliabilityLevel;
}

export interface RunAllOptions extends EngineSelection {
  onProgress?: ProgressSink;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface AnalyzeOptions extends RunAllOptions {
  /** Engines below this level still run and appear in engineResults, but stay out of the verdict. */
  minConsensusReliability?: ReliabilityLevel;
  enableConsensus?: boolean;
}

export interface AnalysisResult {
  request: AnalysisRequest;
  engineResults: EngineOutcome[];
  consensus?: ConsensusResult;
  totalEngines: number;
  successfulEngines: number;
  executionTimeMs: number;
  startedAt: string;
  completedAt: string;
}

export interface AnalysisService {
  readonly registry: EngineRegistry;
  availableEngines(): EngineInfo[];
  runAll(request: AnalysisRequest, options?: RunAllOptions): Promise<EngineOutcome[]>;
  runEngine(name: string, request: AnalysisRequest, options?: RunOptions): Promise<EngineOutcome>;
  analyzeWithConsensus(request: AnalysisRequest, options?: AnalyzeOptions): Promise<AnalysisResult>;
  quickConsensus(symbol: string, timeframe?: string, minReliability?: ReliabilityLevel): Promise<ConsensusResult>;
}

export function createAnalysisService(registry: EngineRegistry = createRegistry()): AnalysisService {
  /** Resolve the engine set from one snapshot, keeping registration order. */
  function selectEngines(selection: EngineSelection): readonly AnalysisEngine[] {
    const snapshot = registry.snapshot();
    let selected: readonly AnalysisEngine[] = snapshot;

    if (selection.engineNames) {
      const wanted = new Set(selection.engineNames);
      for (const name of wanted) {
        if (!snapshot.some((e) => e.name === name)) {
          throw new EngineNotFoundError(name, snapshot.map((e) => e.name));
        }
      }
      selected = selected.filter((e) => wanted.has(e.name));
    }

    const { engineTypes, minReliability } = selection;
    if (engineTypes) {
      selected = selected.filter((e) => engineTypes.includes(e.type));
    }
    if (minReliability) {
      selected = selected.filter((e) => meetsReliability(e.reliability, minReliability));
    }
    return selected;
  }

  async function runAll(request: AnalysisRequest, options: RunAllOptions = {}): Promise<EngineOutcome[]> {
    const engines = selectEngines(options);
    return scheduleAll(request, engines, options);
  }

  async function runEngine(name: string, request: AnalysisRequest, options: RunOptions = {}): Promise<EngineOutcome> {
    const engine = registry.get(name);
    if (!engine) {
      throw new EngineNotFoundError(name, registry.names());
    }
    return scheduleOne(request, engine, options);
  }

  async function analyzeWithConsensus(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const { enableConsensus = true, minConsensusReliability } = options;
    const engines = selectEngines(options);
    const startedAt = new Date();
    const started = Date.now();

    const engineResults = await scheduleAll(request, engines, options);
    const successes = engineResults.filter(isSuccess);

    let consensus: ConsensusResult | undefined;
    if (enableConsensus) {
      const reliabilityOf = new Map(engines.map((e) => [e.name, e.reliability]));
      const inputs: ConsensusInput[] = [];
      for (const outcome of successes) {
        const reliability = reliabilityOf.get(outcome.engine);
        if (reliability === undefined) continue;
        inputs.push({ engine: outcome.engine, reliability, facts: outcome.envelope.facts });
      }
      consensus = computeConsensus(inputs, { minReliability: minConsensusReliability });
    }

    const completedAt = new Date();
    const result: AnalysisResult = {
      request,
      engineResults,
      consensus,
      totalEngines: engineResults.length,
      successfulEngines: successes.length,
      executionTimeMs: Date.now() - started,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
    };

    log.info(
      {
        symbol: request.symbol,
        timeframe: request.timeframe,
        successful: result.successfulEngines,
        total: result.totalEngines,
        signal: consensus?.signal ?? null,
        duration_ms: result.executionTimeMs,
      },
      `Analysis ${request.symbol}: ${result.successfulEngines}/${result.totalEngines} engines`,
    );

    return result;
  }

  async function quickConsensus(
    symbol: string,
    timeframe: string = config.analysis.defaultTimeframe,
    minReliability?: ReliabilityLevel,
  ): Promise<ConsensusResult> {
    const result = await analyzeWithConsensus(createRequest(symbol, timeframe), { minReliability });
    if (!result.consensus) {
      throw new Error("Consensus was not computed");
    }
    return result.consensus;
  }

  return {
    registry,
    availableEngines: () => registry.describe(),
    runAll,
    runEngine,
    analyzeWithConsensus,
    quickConsensus,
  };
}
