import type {
  AnalysisEngine,
  AnalysisRequest,
  EngineRunContext,
  EngineType,
  Facts,
  QualityMeta,
  ReliabilityLevel,
  ResultEnvelope,
} from "./types.js";

export interface EngineDefinition {
  name: string;
  type?: EngineType;
  reliability?: ReliabilityLevel;
  description?: string;
  timeoutMs?: number;
  /** Produces the facts; the envelope around them is built here. */
  analyze(request: AnalysisRequest, context: EngineRunContext): Promise<{ facts: Facts; quality?: QualityMeta }>;
}

/**
 * Wrap a plain async analysis function as an engine. Unspecified type and
 * reliability default to an experimental scanner.
 */
export function defineEngine(def: EngineDefinition): AnalysisEngine {
  const { name, analyze } = def;
  return Object.freeze({
    name,
    type: def.type ?? "scanner",
    reliability: def.reliability ?? "experimental",
    description: def.description,
    timeoutMs: def.timeoutMs,
    async run(request: AnalysisRequest, context: EngineRunContext): Promise<ResultEnvelope> {
      const { facts, quality } = await analyze(request, context);
      return {
        engine: name,
        timeframe: request.timeframe,
        asOf: request.asOf,
        facts,
        quality: quality ?? {},
      };
    },
  });
}

/** Resolve after `ms`, or reject as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
