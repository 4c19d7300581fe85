import { afterEach, describe, expect, it, vi } from "vitest";
import { getConfig, SUPPORTED_EXT } from "../src/config";

describe("getConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies defaults for an empty environment", () => {
    const c = getConfig({});
    expect(c).toMatchObject({
      DATA_DIR: "data",
      STORE_DIR: "store",
      ALLOWED_EXT: [...SUPPORTED_EXT],
      EXCLUDED_PREFIXES: [],
      EXCLUDED_FOLDERS: ["node_modules", ".git", ".cache"],
      CHUNK_TOKENS: 400,
      CHUNK_OVERLAP: 60,
      EMBEDDING_MODEL: "text-embedding-3-small",
      EMBEDDING_BASE_URL: undefined,
      EMBEDDING_API_KEY: undefined,
      DEFAULT_K: 4,
      DEFAULT_PROVIDER: "azure",
      LLM_BASE_URL: undefined,
      LLM_API_KEY: undefined,
      LLM_MODEL: "DeepSeek-R1",
      LLM_TEMPERATURE: 0.2,
      GENERATION_TIMEOUT_MS: 60_000,
      MAX_SESSIONS: 1000,
      TRANSPORT: "stdio",
      HTTP_PORT: 8000,
      HOST: "127.0.0.1",
      CORS_ORIGINS: "*",
      VERBOSE: false,
    });
  });

  it("derives the endpoint from the Azure variables", () => {
    const c = getConfig({
      AZURE_OPENAI_ENDPOINT: "https://example.services.ai.azure.com/",
      AZURE_OPENAI_API_KEY: "test-secret",
      AZURE_OPENAI_MODEL: "my-deployment",
    });
    expect(c.LLM_BASE_URL).toBe("https://example.services.ai.azure.com/openai/v1");
    expect(c.LLM_API_KEY).toBe("test-secret");
    expect(c.LLM_MODEL).toBe("my-deployment");
  });

  it("prefers explicit LLM_* values", () => {
    const c = getConfig({
      LLM_BASE_URL: "http://localhost:11434/v1//",
      AZURE_OPENAI_ENDPOINT: "https://ignored.example",
      LLM_MODEL: "qwen",
    });
    expect(c.LLM_BASE_URL).toBe("http://localhost:11434/v1");
    expect(c.LLM_MODEL).toBe("qwen");
  });

  it("embeds through the generation endpoint unless told otherwise", () => {
    const shared = getConfig({ AZURE_OPENAI_ENDPOINT: "https://example.test", AZURE_OPENAI_API_KEY: "test-secret" });
    expect(shared.EMBEDDING_BASE_URL).toBe("https://example.test/openai/v1");
    expect(shared.EMBEDDING_API_KEY).toBe("test-secret");

    const separate = getConfig({
      LLM_BASE_URL: "https://llm.example.test/v1",
      EMBEDDING_BASE_URL: "http://127.0.0.1:11434/v1/",
      EMBEDDING_API_KEY: "other-secret",
      EMBEDDING_MODEL: "nomic-embed-text",
    });
    expect(separate.EMBEDDING_BASE_URL).toBe("http://127.0.0.1:11434/v1");
    expect(separate.EMBEDDING_API_KEY).toBe("other-secret");
    expect(separate.EMBEDDING_MODEL).toBe("nomic-embed-text");
  });

  it("keeps only supported extensions", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(getConfig({ ALLOWED_EXT: ".MD, txt, csv" }).ALLOWED_EXT).toEqual(["md", "txt"]);
    expect(getConfig({ ALLOWED_EXT: "csv" }).ALLOWED_EXT).toEqual([...SUPPORTED_EXT]);
  });

  it("falls back on invalid numbers and caps large ones", () => {
    const c = getConfig({
      CHUNK_TOKENS: "zero",
      CHUNK_OVERLAP: "-5",
      DEFAULT_K: "500",
      GENERATION_TIMEOUT_MS: "0",
      LLM_TEMPERATURE: "7",
    });
    expect(c.CHUNK_TOKENS).toBe(400);
    expect(c.CHUNK_OVERLAP).toBe(60);
    expect(c.DEFAULT_K).toBe(50);
    expect(c.GENERATION_TIMEOUT_MS).toBe(60_000);
    expect(c.LLM_TEMPERATURE).toBe(0.2);
  });

  it("parses transport, origins and verbosity", () => {
    const c = getConfig({
      TRANSPORT: "Streamable-HTTP",
      CORS_ORIGINS: "http://a.test, http://b.test",
      VERBOSE: "yes",
      HTTP_PORT: "9001",
    });
    expect(c.TRANSPORT).toBe("http");
    expect(c.CORS_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
    expect(c.VERBOSE).toBe(true);
    expect(c.HTTP_PORT).toBe(9001);
  });
});
