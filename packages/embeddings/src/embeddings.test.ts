import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { ExternalServiceError, InvalidConfigurationError } from "@quarry/errors";
import { createEmbeddingProvider } from "./factory.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { HttpEmbeddingProvider } from "./http-provider.js";

const { embedMock } = vi.hoisted(() => ({ embedMock: vi.fn() }));

vi.mock("cohere-ai", () => ({
  CohereClient: class {
    v2 = { embed: embedMock };
  },
}));

function jsonResponse(body: unknown, init?: ResponseInit): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

describe("Embeddings", () => {
  describe("createEmbeddingProvider factory", () => {
    it("creates CohereEmbeddingProvider for type 'cohere'", () => {
      const provider = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-cohere-key" },
      });
      expect(provider).toBeInstanceOf(CohereEmbeddingProvider);
      expect(provider.name).toBe("cohere");
      expect(provider.dimensions).toBe(1024);
    });

    it("creates HttpEmbeddingProvider for type 'http'", () => {
      const provider = createEmbeddingProvider({
        provider: "http",
        http: { baseUrl: "http://localhost:8080" },
      });
      expect(provider).toBeInstanceOf(HttpEmbeddingProvider);
      expect(provider.name).toBe("http");
      expect(provider.dimensions).toBe(1024);
    });

    it("respects custom dimensions", () => {
      const cohere = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-cohere-key", dimensions: 384 },
      });
      const http = createEmbeddingProvider({
        provider: "http",
        http: { baseUrl: "http://localhost:8080", dimensions: 768 },
      });
      expect(cohere.dimensions).toBe(384);
      expect(http.dimensions).toBe(768);
    });

    it("throws a configuration error for missing cohere config", () => {
      expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
        "Cohere config is required",
      );
      expect(() =>
        createEmbeddingProvider({ provider: "cohere", cohere: { apiKey: "" } }),
      ).toThrow(InvalidConfigurationError);
    });

    it("throws for missing http config", () => {
      expect(() => createEmbeddingProvider({ provider: "http" })).toThrow(
        "HTTP config is required",
      );
    });

    it("throws for unknown provider", () => {
      expect(() => createEmbeddingProvider({ provider: "unknown" as "cohere" })).toThrow(
        "Unknown embedding provider",
      );
    });
  });

  describe("CohereEmbeddingProvider", () => {
    beforeEach(() => {
      embedMock.mockReset();
    });

    it("embeds passages as search documents in batches of 96", async () => {
      embedMock.mockImplementation((request: { texts: string[] }) =>
        Promise.resolve({
          embeddings: { float: request.texts.map(() => [0.1, 0.2]) },
          meta: { billedUnits: { inputTokens: request.texts.length } },
        }),
      );
      const provider = new CohereEmbeddingProvider({ apiKey: "test-cohere-key" });
      const texts = Array.from({ length: 100 }, (_, i) => `passage ${String(i)}`);

      const result = await provider.batchEmbed(texts);

      expect(embedMock).toHaveBeenCalledTimes(2);
      expect(embedMock.mock.calls[0]?.[0]).toMatchObject({
        model: "embed-english-v3.0",
        inputType: "search_document",
        embeddingTypes: ["float"],
      });
      expect(result.embeddings).toHaveLength(100);
      expect(result.tokensUsed).toBe(100);
      expect(result.model).toBe("embed-english-v3.0");
    });

    it("embeds queries as search queries and forwards the abort signal", async () => {
      embedMock.mockResolvedValue({ embeddings: { float: [[1, 0]] } });
      const provider = new CohereEmbeddingProvider({ apiKey: "test-cohere-key", model: "embed-v4.0" });
      const controller = new AbortController();

      const result = await provider.embed("what changed?", { signal: controller.signal });

      expect(embedMock).toHaveBeenCalledWith(
        { texts: ["what changed?"], model: "embed-v4.0", inputType: "search_query", embeddingTypes: ["float"] },
        { abortSignal: controller.signal },
      );
      expect(result.embeddings).toEqual([[1, 0]]);
      expect(result.tokensUsed).toBe(0);
    });

    it("does not call the API once the signal has aborted", async () => {
      const provider = new CohereEmbeddingProvider({ apiKey: "test-cohere-key" });
      const controller = new AbortController();
      controller.abort(new Error("stop"));

      await expect(provider.batchEmbed(["a"], { signal: controller.signal })).rejects.toThrow("stop");
      expect(embedMock).not.toHaveBeenCalled();
    });
  });

  describe("HttpEmbeddingProvider", () => {
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
      fetchMock.mockReset();
      vi.stubGlobal("fetch", fetchMock);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it("posts texts to /embed and maps the response", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ embeddings: [[0.5, 0.5]], tokens_used: 7 }));
      const provider = new HttpEmbeddingProvider({ baseUrl: "http://localhost:8080/", dimensions: 2 });

      const result = await provider.batchEmbed(["hello"]);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("http://localhost:8080/embed");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(JSON.stringify({ texts: ["hello"], dimensions: 2 }));
      expect(result).toEqual({ embeddings: [[0.5, 0.5]], model: "http", tokensUsed: 7, dimensions: 2 });
    });

    it("throws ExternalServiceError on a non-OK reply", async () => {
      fetchMock.mockResolvedValue(
        new Response("boom", { status: 500, statusText: "Internal Server Error" }),
      );
      const provider = new HttpEmbeddingProvider({ baseUrl: "http://localhost:8080" });

      const error: unknown = await provider.embed("hello").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error).toMatchObject({
        message: "Embedding server returned 500 Internal Server Error",
        statusCode: 502,
        service: "embedding-server",
      });
    });

    it("throws ExternalServiceError on a malformed body", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ embeddings: "nope" }));
      const provider = new HttpEmbeddingProvider({ baseUrl: "http://localhost:8080" });

      await expect(provider.embed("hello")).rejects.toThrow(
        "Embedding server returned a malformed body",
      );
    });
  });
});
