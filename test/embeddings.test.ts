import { MockEmbeddingModelV2 } from "ai/test";
import { afterEach, describe, expect, it, vi } from "vitest";
import { getConfig } from "../src/config";
import { createEmbeddings, Embeddings } from "../src/embeddings";
import { ConfigError, EmbeddingError } from "../src/errors";

function lengthModel() {
  return new MockEmbeddingModelV2<string>({
    maxEmbeddingsPerCall: 100,
    doEmbed: async ({ values }) => ({ embeddings: values.map((v) => [v.length, 1]) }),
  });
}

describe("Embeddings", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns one Float32Array per input in input order", async () => {
    const model = lengthModel();
    const embeddings = new Embeddings("test-embed", model);

    const vectors = await embeddings.embed(["a", "abc", "ab"]);

    expect(vectors.map((v) => Array.from(v))).toEqual([
      [1, 1],
      [3, 1],
      [2, 1],
    ]);
    expect(vectors.every((v) => v instanceof Float32Array)).toBe(true);
    expect(model.doEmbedCalls).toHaveLength(1);
    expect(model.doEmbedCalls[0].values).toEqual(["a", "abc", "ab"]);
  });

  it("does not call the endpoint for an empty batch", async () => {
    const model = lengthModel();
    expect(await new Embeddings("test-embed", model).embed([])).toEqual([]);
    expect(model.doEmbedCalls).toEqual([]);
  });

  it("reports endpoint failures as upstream errors", async () => {
    const model = new MockEmbeddingModelV2<string>({
      maxEmbeddingsPerCall: 100,
      doEmbed: async () => {
        throw new Error("connection refused");
      },
    });
    const err = await new Embeddings("test-embed", model, { maxRetries: 0 })
      .embed(["q"])
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EmbeddingError);
    if (!(err instanceof EmbeddingError)) return;
    expect(err.kind).toBe("upstream");
    expect(err.message).toContain("Embedding with 'test-embed' failed:");
    expect(err.message).toContain("connection refused");
  });

  it("needs an endpoint", () => {
    expect(() => createEmbeddings(getConfig({}))).toThrow(ConfigError);
  });

  it("records the configured model id as its name", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const embeddings = createEmbeddings(
      getConfig({ EMBEDDING_BASE_URL: "http://127.0.0.1:9/v1", EMBEDDING_MODEL: "nomic-embed-text" }),
    );
    expect(embeddings.modelName).toBe("nomic-embed-text");
  });
});
