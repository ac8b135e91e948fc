import { describe, it, expect } from "vitest";
import { InvalidConfigurationError } from "@quarry/errors";
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./engine-config.js";

function captureError(fn: () => unknown): InvalidConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidConfigurationError) return err;
    throw err;
  }
  throw new Error("expected InvalidConfigurationError");
}

describe("resolveEngineConfig", () => {
  it("returns the defaults when nothing is given", () => {
    expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("documents the recognised defaults", () => {
    expect(DEFAULT_ENGINE_CONFIG.chunkSize).toBe(1000);
    expect(DEFAULT_ENGINE_CONFIG.overlap).toBe(200);
    expect(DEFAULT_ENGINE_CONFIG.topK).toBe(5);
    expect(DEFAULT_ENGINE_CONFIG.lexicalWeights).toEqual({
      jaccard: 0.4,
      substring: 0.3,
      wordMatch: 0.3,
    });
    expect(DEFAULT_ENGINE_CONFIG.vectorBackendEnabled).toBe(false);
  });

  it("merges partial overrides with defaults", () => {
    const config = resolveEngineConfig({ chunkSize: 500, overlap: 50, topK: 3 });

    expect(config.chunkSize).toBe(500);
    expect(config.overlap).toBe(50);
    expect(config.topK).toBe(3);
    expect(config.lexicalWeights).toEqual(DEFAULT_ENGINE_CONFIG.lexicalWeights);
  });

  it("accepts weights that sum to 1 within tolerance", () => {
    const config = resolveEngineConfig({
      lexicalWeights: { jaccard: 0.1, substring: 0.2, wordMatch: 0.7 },
    });
    expect(config.lexicalWeights.wordMatch).toBe(0.7);
  });

  it("rejects overlap equal to chunkSize", () => {
    const err = captureError(() => resolveEngineConfig({ chunkSize: 200, overlap: 200 }));

    expect(err.code).toBe("INVALID_CONFIGURATION");
    expect(err.fields).toEqual({ overlap: "overlap must be smaller than chunkSize" });
  });

  it("rejects overlap larger than the default chunkSize", () => {
    expect(() => resolveEngineConfig({ overlap: 1500 })).toThrow(InvalidConfigurationError);
  });

  it("rejects weights that do not sum to 1", () => {
    const err = captureError(() =>
      resolveEngineConfig({ lexicalWeights: { jaccard: 0.5, substring: 0.5, wordMatch: 0.5 } }),
    );

    expect(err.fields).toEqual({ lexicalWeights: "lexicalWeights must sum to 1.0" });
  });

  it("rejects negative weights with a dotted field path", () => {
    const err = captureError(() =>
      resolveEngineConfig({ lexicalWeights: { jaccard: -0.2, substring: 0.6, wordMatch: 0.6 } }),
    );

    expect(Object.keys(err.fields)).toEqual(["lexicalWeights.jaccard"]);
  });

  it("rejects a non-integer chunkSize", () => {
    const err = captureError(() => resolveEngineConfig({ chunkSize: 1200.5 }));
    expect(Object.keys(err.fields)).toEqual(["chunkSize"]);
  });

  it("rejects an unknown context format", () => {
    expect(() =>
      resolveEngineConfig({ contextFormat: "html" as "plain" }),
    ).toThrow(InvalidConfigurationError);
  });
});
