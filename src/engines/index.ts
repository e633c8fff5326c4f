import type { AnalysisEngine } from "../engine/types.js";
import { createDowEngine } from "./dow.js";
import { createWyckoffEngine } from "./wyckoff.js";
import { createMomentumScannerEngine } from "./momentum-scanner.js";

export { createDowEngine, createWyckoffEngine, createMomentumScannerEngine };

/** The engine set a default service starts with, in registration order. */
export function defaultEngines(): AnalysisEngine[] {
  return [createDowEngine(), createWyckoffEngine(), createMomentumScannerEngine()];
}
