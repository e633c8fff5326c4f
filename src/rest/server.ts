import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import type { AnalysisService } from "../analysis/service.js";
import { createRouter } from "./routes.js";
import { config } from "../config.js";
import { requestLogger, logRest } from "../logging.js";

export function apiKeyAuth(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }
    const header = req.headers["x-api-key"];
    const provided =
      (typeof header === "string" ? header : undefined) ??
      req.headers.authorization?.replace(/^Bearer\s+/i, "");
    const providedBuffer = Buffer.from(provided ?? "");
    const keyBuffer = Buffer.from(apiKey);

    if (providedBuffer.length === keyBuffer.length && timingSafeEqual(providedBuffer, keyBuffer)) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

export function createApp(service: AnalysisService, apiKey: string = config.rest.apiKey): Express {
  const app = express();
  app.use(express.json({ limit: "100kb" }));
  app.use(requestLogger);
  app.use("/api", apiKeyAuth(apiKey), createRouter(service));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON bodies land here from express.json()
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
      ? err.status
      : 500;
    res.status(status).json({ error: status === 400 ? "Invalid JSON body" : "Internal server error" });
  });

  return app;
}

export function startRestServer(service: AnalysisService, port: number = config.rest.port): Promise<Server> {
  const app = createApp(service);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logRest.info({ port }, `REST server listening on http://localhost:${port}`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
