import dotenv from "dotenv";

dotenv.config();

/** Largest delay a Node timer honours; longer ones fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const config = {
  scheduler: {
    /** Default per-engine timeout; 0 disables it. Engines may declare their own. */
    engineTimeoutMs: parseInt(process.env.ENGINE_TIMEOUT_MS ?? "30000", 10),
  },
  analysis: {
    defaultTimeframe: process.env.DEFAULT_TIMEFRAME ?? "1D",
  },
  rest: {
    port: parseInt(process.env.REST_PORT ?? "3000", 10),
    apiKey: process.env.REST_API_KEY ?? "",
  },
  log: {
    level: process.env.LOG_LEVEL ?? "info",
    dir: process.env.LOG_DIR ?? "",
  },
};

export type AppConfig = typeof config;
