import { MAX_TIMEOUT_MS, type AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - Engine timeout is a non-negative integer no larger than a timer can hold (warning above 5 minutes)
 * - Default timeframe is set
 * - Log level is one pino knows
 * - API key is at least 16 characters (warning if shorter)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  const timeout = cfg.scheduler.engineTimeoutMs;
  if (!Number.isInteger(timeout) || timeout < 0) {
    errors.push(`scheduler.engineTimeoutMs must be a non-negative integer, got ${timeout}`);
  } else if (timeout > MAX_TIMEOUT_MS) {
    errors.push(`scheduler.engineTimeoutMs must be at most ${MAX_TIMEOUT_MS}, got ${timeout}`);
  } else if (timeout > 300_000) {
    warnings.push(`scheduler.engineTimeoutMs is ${timeout}ms; a stuck engine will hold the analysis for over 5 minutes`);
  }

  if (!cfg.analysis.defaultTimeframe.trim()) {
    errors.push("analysis.defaultTimeframe is required");
  }

  if (!LOG_LEVELS.includes(cfg.log.level)) {
    errors.push(`log.level must be one of ${LOG_LEVELS.join(", ")}, got ${cfg.log.level}`);
  }

  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
