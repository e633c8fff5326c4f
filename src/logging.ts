import pino from "pino";
import type { TransportTargetOptions } from "pino";
import path from "node:path";
import fs from "node:fs";
import type { Request, Response, NextFunction } from "express";
import { config } from "./config.js";

// Tests stay quiet unless LOG_LEVEL is set explicitly
const underTest = process.env.VITEST !== undefined && process.env.LOG_LEVEL === undefined;

// Daily JSON file, filename: consensus-YYYY-MM-DD.log
function logFilePath(dir: string): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(dir, `consensus-${date}.log`);
}

function buildTargets(): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [
    {
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
      level: config.log.level,
    },
  ];
  if (config.log.dir) {
    if (!fs.existsSync(config.log.dir)) fs.mkdirSync(config.log.dir, { recursive: true });
    targets.push({
      target: "pino/file",
      options: { destination: logFilePath(config.log.dir), mkdir: true },
      level: "debug", // file gets everything
    });
  }
  return targets;
}

export const logger = underTest
  ? pino({ level: "silent" })
  : pino(
    {
      level: "debug", // base level — targets filter individually
      base: { service: "engine-consensus" },
    },
    pino.transport({ targets: buildTargets() }),
  );

// Typed child loggers for subsystems
export const logScheduler = logger.child({ subsystem: "scheduler" });
export const logConsensus = logger.child({ subsystem: "consensus" });
export const logRegistry = logger.child({ subsystem: "registry" });
export const logRest = logger.child({ subsystem: "rest" });

// Express request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}
