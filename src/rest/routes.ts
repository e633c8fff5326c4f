import { Router, type Response } from "express";
import { z } from "zod";
import type { AnalysisService } from "../analysis/service.js";
import { createRequest } from "../engine/types.js";
import { EngineNotFoundError, errorMessage } from "../engine/errors.js";
import { EngineTypeSchema, ReliabilityLevelSchema } from "../engine/schema.js";
import { config, MAX_TIMEOUT_MS } from "../config.js";
import { logRest } from "../logging.js";

const SymbolSchema = z.string().trim().min(1).max(32).regex(/^[A-Za-z0-9.\-_/^=]+$/, "invalid symbol");

export const AnalyzeBodySchema = z.object({
  symbol: SymbolSchema,
  timeframe: z.string().trim().min(1).max(16).optional(),
  asOf: z.coerce.date().optional(),
  engines: z.array(z.string().min(1)).min(1).optional(),
  types: z.array(EngineTypeSchema).min(1).optional(),
  minReliability: ReliabilityLevelSchema.optional(),
  minConsensusReliability: ReliabilityLevelSchema.optional(),
  consensus: z.boolean().optional(),
  timeoutMs: z.number().int().nonnegative().max(MAX_TIMEOUT_MS).optional(),
});

const ConsensusQuerySchema = z.object({
  timeframe: z.string().trim().min(1).max(16).optional(),
  minReliability: ReliabilityLevelSchema.optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

function sendError(res: Response, e: unknown): void {
  if (e instanceof EngineNotFoundError) {
    res.status(404).json({ error: e.message });
    return;
  }
  logRest.error({ err: errorMessage(e) }, "Request failed");
  res.status(500).json({ error: errorMessage(e) });
}

/** Abort engines still running when the client goes away before the response. */
function cancelOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function createRouter(service: AnalysisService): Router {
  const router = Router();

  // GET /api/health
  router.get("/health", (_req, res) => {
    res.json({ status: "ok", engines: service.registry.names().length });
  });

  // GET /api/engines
  router.get("/engines", (_req, res) => {
    res.json({ engines: service.availableEngines() });
  });

  // POST /api/analyze — run engines and compute consensus
  router.post("/analyze", async (req, res) => {
    const parsed = AnalyzeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }
    const body = parsed.data;
    try {
      const request = createRequest(
        body.symbol.toUpperCase(),
        body.timeframe ?? config.analysis.defaultTimeframe,
        body.asOf ?? new Date(),
      );
      const result = await service.analyzeWithConsensus(request, {
        engineNames: body.engines,
        engineTypes: body.types,
        minReliability: body.minReliability,
        minConsensusReliability: body.minConsensusReliability,
        enableConsensus: body.consensus ?? true,
        timeoutMs: body.timeoutMs,
        signal: cancelOnDisconnect(res),
      });
      res.json(result);
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  // GET /api/consensus/:symbol — verdict only
  router.get("/consensus/:symbol", async (req, res) => {
    const symbol = SymbolSchema.safeParse(req.params.symbol);
    const query = ConsensusQuerySchema.safeParse(req.query);
    if (!symbol.success) {
      res.status(400).json({ error: formatIssues(symbol.error) });
      return;
    }
    if (!query.success) {
      res.status(400).json({ error: formatIssues(query.error) });
      return;
    }
    try {
      const consensus = await service.quickConsensus(
        symbol.data.toUpperCase(),
        query.data.timeframe ?? config.analysis.defaultTimeframe,
        query.data.minReliability,
      );
      res.json({ symbol: symbol.data.toUpperCase(), ...consensus });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  return router;
}
