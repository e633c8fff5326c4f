import { createRegistry } from "../engine/registry.js";
import { defaultEngines } from "../engines/index.js";
import { createAnalysisService, type AnalysisService } from "./service.js";

/** A fresh service with the default engine set registered. Nothing is shared between calls. */
export function createDefaultService(): AnalysisService {
  return createAnalysisService(createRegistry(defaultEngines()));
}
