export class DuplicateNameError extends Error {
  constructor(readonly engine: string) {
    super(`Engine "${engine}" is already registered`);
    this.name = "DuplicateNameError";
  }
}

/** Configuration error: an explicitly requested engine is not in the registry. */
export class EngineNotFoundError extends Error {
  constructor(readonly engine: string, readonly available: readonly string[]) {
    super(`Engine "${engine}" not found (available: ${available.join(", ") || "none"})`);
    this.name = "EngineNotFoundError";
  }
}

export class EngineTimeoutError extends Error {
  constructor(readonly engine: string, readonly timeoutMs: number) {
    super(`${engine} timed out after ${timeoutMs}ms`);
    this.name = "EngineTimeoutError";
  }
}

export class AnalysisCancelledError extends Error {
  constructor(readonly engine: string) {
    super(`${engine} cancelled`);
    this.name = "AnalysisCancelledError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
