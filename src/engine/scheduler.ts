import type {
  AnalysisEngine,
  AnalysisRequest,
  EngineOutcome,
  EngineProgress,
  EngineRunContext,
  ProgressSink,
  ResultEnvelope,
} from "./types.js";
import { createRequest } from "./types.js";
import { parseEnvelope } from "./schema.js";
import { AnalysisCancelledError, EngineTimeoutError, errorMessage } from "./errors.js";
import { config, MAX_TIMEOUT_MS } from "../config.js";
import { logScheduler } from "../logging.js";

export interface RunOptions {
  onProgress?: ProgressSink;
  /** Per-engine timeout for this call. Falls back to the engine's own, then the configured default. 0 disables. */
  timeoutMs?: number;
  /** Cancels every engine still running; their outcomes become "cancelled". */
  signal?: AbortSignal;
}

function resolveTimeout(engine: AnalysisEngine, override: number | undefined): number {
  return Math.min(override ?? engine.timeoutMs ?? config.scheduler.engineTimeoutMs, MAX_TIMEOUT_MS);
}

function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, percent));
}

// Never awaited: a slow or failing sink must not hold up any engine
function emitProgress(sink: ProgressSink | undefined, progress: EngineProgress): void {
  if (!sink) return;
  try {
    const pending = sink(progress);
    if (pending instanceof Promise) {
      pending.catch((e: unknown) => {
        logScheduler.warn({ engine: progress.engine, err: errorMessage(e) }, "Progress sink rejected");
      });
    }
  } catch (e: unknown) {
    logScheduler.warn({ engine: progress.engine, err: errorMessage(e) }, "Progress sink threw");
  }
}

/**
 * Run a single engine against its own copy of the request. Always resolves:
 * thrown errors, rejections, malformed envelopes, timeouts and cancellation
 * all become outcomes.
 */
export function runEngine(
  request: AnalysisRequest,
  engine: AnalysisEngine,
  options: RunOptions = {},
): Promise<EngineOutcome> {
  const { onProgress, signal } = options;
  const timeoutMs = resolveTimeout(engine, options.timeoutMs);
  const controller = new AbortController();
  const started = Date.now();
  const elapsed = () => Date.now() - started;
  const name = engine.name;

  return new Promise<EngineOutcome>((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (outcome: EngineOutcome): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onCancel);
      resolve(outcome);
    };

    function onCancel(): void {
      const reason = new AnalysisCancelledError(name);
      finish({ status: "cancelled", engine: name, error: reason.message, durationMs: elapsed() });
      controller.abort(reason);
    }

    if (signal?.aborted) {
      onCancel();
      return;
    }
    signal?.addEventListener("abort", onCancel, { once: true });

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        const reason = new EngineTimeoutError(name, timeoutMs);
        logScheduler.warn({ engine: name, timeout_ms: timeoutMs }, reason.message);
        finish({ status: "timeout", engine: name, error: reason.message, timeoutMs, durationMs: elapsed() });
        controller.abort(reason);
      }, timeoutMs);
    }

    const context: EngineRunContext = {
      signal: controller.signal,
      report(stage, percent, note) {
        // Late reports from a timed-out or cancelled engine are dropped
        if (settled) return;
        emitProgress(onProgress, { engine: name, stage, percent: clampPercent(percent), note });
      },
    };

    let pending: Promise<ResultEnvelope>;
    try {
      pending = engine.run(createRequest(request.symbol, request.timeframe, request.asOf), context);
    } catch (e: unknown) {
      pending = Promise.reject(e);
    }

    void pending.then(
      (value) => {
        const parsed = parseEnvelope(value);
        if (!parsed.ok) {
          finish({ status: "failure", engine: name, error: parsed.error, durationMs: elapsed() });
        } else if (parsed.envelope.engine !== name) {
          finish({
            status: "failure",
            engine: name,
            error: `Envelope names engine "${parsed.envelope.engine}", expected "${name}"`,
            durationMs: elapsed(),
          });
        } else {
          finish({ status: "success", engine: name, envelope: parsed.envelope, durationMs: elapsed() });
        }
      },
      (e: unknown) => {
        finish({ status: "failure", engine: name, error: errorMessage(e), durationMs: elapsed() });
      },
    );
  });
}

/**
 * Run every engine concurrently and wait for all of them (or for
 * cancellation). Outcomes come back in input order, not completion order.
 */
export async function runAll(
  request: AnalysisRequest,
  engines: readonly AnalysisEngine[],
  options: RunOptions = {},
): Promise<EngineOutcome[]> {
  logScheduler.info(`Running ${engines.length} engine(s) for ${request.symbol} ${request.timeframe}`);

  // runEngine never rejects, so Promise.all is the all-complete barrier
  const outcomes = await Promise.all(engines.map((engine) => runEngine(request, engine, options)));

  const succeeded = outcomes.filter((o) => o.status === "success").length;
  logScheduler.info(`${succeeded}/${outcomes.length} engines completed successfully`);
  for (const o of outcomes) {
    if (o.status === "success") {
      logScheduler.debug(`  ${o.engine}: ok (${o.durationMs}ms)`);
    } else {
      logScheduler.warn(`  ${o.engine}: ${o.status.toUpperCase()} — ${o.error} (${o.durationMs}ms)`);
    }
  }

  return outcomes;
}
