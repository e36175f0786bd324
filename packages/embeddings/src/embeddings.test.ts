import { describe, it, expect, vi, beforeEach } from "vitest";

const { openaiCreate, cohereEmbed } = vi.hoisted(() => ({
  openaiCreate: vi.fn(),
  cohereEmbed: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    embeddings = { create: openaiCreate };
  },
}));

vi.mock("cohere-ai", () => ({
  CohereClient: class {
    v2 = { embed: cohereEmbed };
  },
}));

import { createEmbeddingProvider } from "./factory.js";

describe("Embeddings", () => {
  beforeEach(() => {
    openaiCreate.mockReset();
    cohereEmbed.mockReset();
  });

  describe("createEmbeddingProvider factory", () => {
    it("creates OpenAIEmbeddingProvider for type 'openai'", () => {
      const provider = createEmbeddingProvider({
        provider: "openai",
        openai: { apiKey: "test-key" },
      });
      expect(provider.name).toBe("openai");
      expect(provider.model).toBe("text-embedding-3-small");
      expect(provider.dimensions).toBe(1536);
    });

    it("creates CohereEmbeddingProvider for type 'cohere'", () => {
      const provider = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-key", dimensions: 1024 },
      });
      expect(provider.name).toBe("cohere");
      expect(provider.model).toBe("embed-v4.0");
      expect(provider.dimensions).toBe(1024);
    });

    it("throws for missing provider config", () => {
      expect(() => createEmbeddingProvider({ provider: "openai" })).toThrow(
        "OpenAI config is required",
      );
      expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
        "Cohere config is required",
      );
    });

    it("throws for unknown provider", () => {
      expect(() => createEmbeddingProvider({ provider: "unknown" as "openai" })).toThrow(
        "Unknown embedding provider",
      );
    });
  });

  describe("OpenAIEmbeddingProvider", () => {
    it("requests the configured dimensions and flattens newlines", async () => {
      openaiCreate.mockResolvedValue({
        data: [{ embedding: [0.1, 0.2, 0.3] }],
        model: "text-embedding-3-small",
        usage: { prompt_tokens: 4, total_tokens: 4 },
      });
      const provider = createEmbeddingProvider({
        provider: "openai",
        openai: { apiKey: "test-key", dimensions: 3 },
      });

      const result = await provider.embed("line one\nline two");

      expect(openaiCreate).toHaveBeenCalledWith({
        model: "text-embedding-3-small",
        input: "line one line two",
        dimensions: 3,
      });
      expect(result).toEqual({
        embeddings: [[0.1, 0.2, 0.3]],
        model: "text-embedding-3-small",
      });
    });
  });

  describe("CohereEmbeddingProvider", () => {
    it("embeds as a search query at the configured dimension with retries disabled", async () => {
      cohereEmbed.mockResolvedValue({
        embeddings: { float: [[1, 0]] },
        meta: { billedUnits: { inputTokens: 7 } },
      });
      const provider = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-key", dimensions: 2, timeoutMs: 5000 },
      });

      const result = await provider.embed("What is CIS 1.1?");

      expect(cohereEmbed).toHaveBeenCalledWith(
        {
          texts: ["What is CIS 1.1?"],
          model: "embed-v4.0",
          inputType: "search_query",
          embeddingTypes: ["float"],
          outputDimension: 2,
        },
        { timeoutInSeconds: 5, maxRetries: 0 },
      );
      expect(result).toEqual({ embeddings: [[1, 0]], model: "embed-v4.0" });
    });

  });
});
