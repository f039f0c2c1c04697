import { describe, expect, it } from "vitest";
import { loadAppConfig } from "@/lib/config/load-env";

describe("loadAppConfig", () => {
  it("fills defaults under the data directory", () => {
    const config = loadAppConfig({});

    expect(config).toMatchObject({
      dataDir: ".data",
      indexDir: ".data/index",
      videosDir: ".data/videos",
      refreshStatePath: ".data/refresh-state.json",
      embeddingProvider: "hashing",
      entityMode: "vocabulary",
      chunkMinTokens: 400,
      chunkMaxTokens: 800,
      queryTopK: 8,
      queryMinScore: 0.25,
      queryMaxContextTokens: 3000,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadAppConfig({ KB_DATA_DIR: "/srv/kb", QUERY_MIN_SCORE: "0.4", INGEST_CONCURRENCY: "6" });

    expect(config.indexDir).toBe("/srv/kb/index");
    expect(config.queryMinScore).toBe(0.4);
    expect(config.ingestConcurrency).toBe(6);
  });

  it("names every invalid variable", () => {
    expect(() => loadAppConfig({ KB_EMBEDDING_PROVIDER: "other", QUERY_TOP_K: "zero" })).toThrow(
      /Invalid environment configuration: .*KB_EMBEDDING_PROVIDER.*QUERY_TOP_K/,
    );
  });

  it("rejects a chunk minimum above the maximum", () => {
    expect(() => loadAppConfig({ CHUNK_MIN_TOKENS: "900" })).toThrow(
      "Invalid environment configuration: CHUNK_MIN_TOKENS must not exceed CHUNK_MAX_TOKENS",
    );
  });
});
