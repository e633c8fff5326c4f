import type { AnalysisEngine, EngineType, ReliabilityLevel } from "./types.js";
import { DuplicateNameError } from "./errors.js";
import { meetsReliability, reliabilityWeight } from "./reliability.js";
import { logRegistry } from "../logging.js";

export interface EngineInfo {
  readonly name: string;
  readonly type: EngineType;
  readonly reliability: ReliabilityLevel;
  readonly weight: number;
  readonly description: string | null;
}

export interface EngineRegistry {
  register(engine: AnalysisEngine): void;
  unregister(name: string): boolean;
  get(name: string): AnalysisEngine | undefined;
  has(name: string): boolean;
  names(): string[];
  /** Frozen, registration-ordered view. Never mutated by later (un)registration. */
  snapshot(): readonly AnalysisEngine[];
  filterByType(type: EngineType): readonly AnalysisEngine[];
  filterByMinimumReliability(level: ReliabilityLevel): readonly AnalysisEngine[];
  describe(): EngineInfo[];
}

export function createRegistry(initial: readonly AnalysisEngine[] = []): EngineRegistry {
  // Replaced wholesale on every mutation, so a handed-out snapshot stays valid
  let engines: readonly AnalysisEngine[] = Object.freeze([]);

  function register(engine: AnalysisEngine): void {
    if (engines.some((e) => e.name === engine.name)) {
      throw new DuplicateNameError(engine.name);
    }
    engines = Object.freeze([...engines, engine]);
    logRegistry.debug({ engine: engine.name, type: engine.type, reliability: engine.reliability }, "Engine registered");
  }

  function unregister(name: string): boolean {
    const next = engines.filter((e) => e.name !== name);
    if (next.length === engines.length) return false;
    engines = Object.freeze(next);
    logRegistry.debug({ engine: name }, "Engine unregistered");
    return true;
  }

  function get(name: string): AnalysisEngine | undefined {
    return engines.find((e) => e.name === name);
  }

  function snapshot(): readonly AnalysisEngine[] {
    return engines;
  }

  function filterByType(type: EngineType): readonly AnalysisEngine[] {
    return Object.freeze(engines.filter((e) => e.type === type));
  }

  function filterByMinimumReliability(level: ReliabilityLevel): readonly AnalysisEngine[] {
    return Object.freeze(engines.filter((e) => meetsReliability(e.reliability, level)));
  }

  function describe(): EngineInfo[] {
    return engines.map((e) => ({
      name: e.name,
      type: e.type,
      reliability: e.reliability,
      weight: reliabilityWeight(e.reliability),
      description: e.description ?? null,
    }));
  }

  for (const engine of initial) register(engine);

  return {
    register,
    unregister,
    get,
    has: (name) => get(name) !== undefined,
    names: () => engines.map((e) => e.name),
    snapshot,
    filterByType,
    filterByMinimumReliability,
    describe,
  };
}
