import { describe, it, expect } from "vitest";
import supertest from "supertest";
import { createApp } from "../server.js";
import { createAnalysisService } from "../../analysis/service.js";
import { createRegistry } from "../../engine/registry.js";
import { fakeEngine } from "../../engine/__tests__/fake-engines.js";

function buildApp(apiKey = "") {
  const service = createAnalysisService(
    createRegistry([
      fakeEngine("Dow Theory", { reliability: "high", facts: { primary_trend: "bullish", confidence: 0.9 } }),
      fakeEngine("Wyckoff Method", { reliability: "medium", facts: { position_bias: "bullish", confidence: 0.8 } }),
      fakeEngine("Scanner", { type: "scanner", reliability: "experimental", facts: { signal: "bearish" } }),
    ]),
  );
  return createApp(service, apiKey);
}

describe("REST routes", () => {
  it("GET /api/health", async () => {
    const res = await supertest(buildApp()).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", engines: 3 });
  });

  it("GET /api/engines lists registered engines", async () => {
    const res = await supertest(buildApp()).get("/api/engines");
    expect(res.status).toBe(200);
    expect(res.body.engines.map((e: { name: string }) => e.name)).toEqual(["Dow Theory", "Wyckoff Method", "Scanner"]);
    expect(res.body.engines[2]).toEqual({
      name: "Scanner",
      type: "scanner",
      reliability: "experimental",
      weight: 0.3,
      description: null,
    });
  });

  it("POST /api/analyze returns engine results and consensus", async () => {
    const res = await supertest(buildApp())
      .post("/api/analyze")
      .send({ symbol: "aapl", timeframe: "1H", asOf: "2026-03-02T14:30:00.000Z" });

    expect(res.status).toBe(200);
    expect(res.body.request).toEqual({ symbol: "AAPL", timeframe: "1H", asOf: "2026-03-02T14:30:00.000Z" });
    expect(res.body.totalEngines).toBe(3);
    expect(res.body.successfulEngines).toBe(3);
    expect(res.body.engineResults[0].envelope.asOf).toBe("2026-03-02T14:30:00.000Z");
    expect(res.body.consensus.signal).toBe("bullish");
    expect(Object.keys(res.body.consensus.engineContributions)).toEqual(["Dow Theory", "Wyckoff Method", "Scanner"]);
  });

  it("POST /api/analyze applies engine and reliability filters", async () => {
    const res = await supertest(buildApp())
      .post("/api/analyze")
      .send({ symbol: "SPY", types: ["traditional"], minConsensusReliability: "high" });

    expect(res.status).toBe(200);
    expect(res.body.engineResults.map((o: { engine: string }) => o.engine)).toEqual(["Dow Theory", "Wyckoff Method"]);
    expect(Object.keys(res.body.consensus.engineContributions)).toEqual(["Dow Theory"]);
  });

  it("POST /api/analyze without consensus", async () => {
    const res = await supertest(buildApp()).post("/api/analyze").send({ symbol: "SPY", consensus: false });
    expect(res.status).toBe(200);
    expect(res.body.consensus).toBeUndefined();
  });

  it("POST /api/analyze rejects an invalid body", async () => {
    const res = await supertest(buildApp()).post("/api/analyze").send({ symbol: "", minReliability: "certain" });
    expect(res.status).toBe(400);
    expect(res.body.error).toContain("symbol");
    expect(res.body.error).toContain("minReliability");
  });

  it("POST /api/analyze rejects a timeout longer than a timer can hold", async () => {
    const res = await supertest(buildApp()).post("/api/analyze").send({ symbol: "SPY", timeoutMs: 3_000_000_000 });
    expect(res.status).toBe(400);
    expect(res.body.error).toMatch(/^timeoutMs: /);
  });

  it("POST /api/analyze rejects malformed JSON", async () => {
    const res = await supertest(buildApp())
      .post("/api/analyze")
      .set("Content-Type", "application/json")
      .send("{not json");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid JSON body" });
  });

  it("POST /api/analyze returns 404 for an unknown engine", async () => {
    const res = await supertest(buildApp()).post("/api/analyze").send({ symbol: "SPY", engines: ["Elliott Wave"] });
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Engine "Elliott Wave" not found (available: Dow Theory, Wyckoff Method, Scanner)');
  });

  it("GET /api/consensus/:symbol returns the verdict", async () => {
    const res = await supertest(buildApp()).get("/api/consensus/tsla?minReliability=medium");
    expect(res.status).toBe(200);
    expect(res.body.symbol).toBe("TSLA");
    expect(res.body.enginesAnalyzed).toBe(2);
    expect(res.body.signal).toBe("bullish");
  });

  it("GET /api/consensus/:symbol rejects an unknown reliability level", async () => {
    const res = await supertest(buildApp()).get("/api/consensus/TSLA?minReliability=extreme");
    expect(res.status).toBe(400);
  });

  it("unknown routes return 404", async () => {
    const res = await supertest(buildApp()).get("/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not found" });
  });

  describe("API key", () => {
    const key = "test-secret-key-0001";

    it("rejects requests without the key", async () => {
      const res = await supertest(buildApp(key)).get("/api/engines");
      expect(res.status).toBe(401);
    });

    it("accepts X-API-Key and Bearer tokens", async () => {
      const viaHeader = await supertest(buildApp(key)).get("/api/health").set("X-API-Key", key);
      const viaBearer = await supertest(buildApp(key)).get("/api/health").set("Authorization", `Bearer ${key}`);
      expect(viaHeader.status).toBe(200);
      expect(viaBearer.status).toBe(200);
    });
  });
});
