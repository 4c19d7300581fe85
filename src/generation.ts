/**
 * Generation backends, keyed by provider name.
 *
 * A backend is a `generate(prompt) -> text` call plus the sanitizers that
 * remove provider-specific scaffolding from its raw output. The default
 * backend talks to an OpenAI-compatible chat completions endpoint (Azure AI
 * Foundry, OVMS, Ollama, ...) through the AI SDK with retries disabled:
 * failures surface to the caller as {@link GenerationError}.
 */
import { generateText, type LanguageModel } from "ai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { Config } from "./config";
import { ConfigError, GenerationError } from "./errors";
import type { GenerateOptions, GenerationBackend, OutputSanitizer } from "./types";

/** Removes `<think>...</think>` reasoning blocks emitted by R1-style models. */
export const stripThinkBlocks: OutputSanitizer = (raw) =>
  raw.replace(/<think>[\s\S]*?<\/think>\s*/g, "");

export const trimOutput: OutputSanitizer = (raw) => raw.trim();

export function applySanitizers(raw: string, sanitizers: readonly OutputSanitizer[]): string {
  return sanitizers.reduce((text, sanitize) => sanitize(text), raw);
}

export interface AiSdkBackendOptions {
  temperature?: number;
  sanitizers?: OutputSanitizer[];
}

export class AiSdkBackend implements GenerationBackend {
  public readonly provider: string;
  public readonly sanitizers: readonly OutputSanitizer[];
  private readonly model: LanguageModel;
  private readonly temperature: number;

  public constructor(provider: string, model: LanguageModel, opts: AiSdkBackendOptions = {}) {
    this.provider = provider;
    this.model = model;
    this.temperature = opts.temperature ?? 0.2;
    this.sanitizers = opts.sanitizers ?? [stripThinkBlocks, trimOutput];
  }

  public async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.model,
        prompt,
        temperature: this.temperature,
        maxRetries: 0,
        abortSignal: options.signal,
      });
      return text;
    } catch (e) {
      // Cancellation is reported by whoever aborted; don't relabel it.
      if (options.signal?.aborted) throw e;
      const reason = e instanceof Error ? e.message : String(e);
      throw new GenerationError(this.provider, `Generation via '${this.provider}' failed: ${reason}`, {
        cause: e,
      });
    }
  }
}

/**
 * Backends available to the orchestrator. The configured provider name
 * (DEFAULT_PROVIDER) maps to the OpenAI-compatible endpoint; without an
 * endpoint the provider is still registered, and generation fails with a
 * {@link ConfigError} while search keeps working.
 */
export function createBackends(config: Config): Record<string, GenerationBackend> {
  const provider = config.DEFAULT_PROVIDER;
  if (!config.LLM_BASE_URL) {
    console.error(
      `[RAG] No LLM_BASE_URL / AZURE_OPENAI_ENDPOINT configured; provider '${provider}' cannot generate.`,
    );
    return {
      [provider]: {
        provider,
        sanitizers: [],
        generate: async () => {
          throw new ConfigError(
            `Provider '${provider}' has no endpoint. Set LLM_BASE_URL or AZURE_OPENAI_ENDPOINT.`,
          );
        },
      },
    };
  }
  const compatible = createOpenAICompatible({
    name: provider,
    baseURL: config.LLM_BASE_URL,
    apiKey: config.LLM_API_KEY,
  });
  return {
    [provider]: new AiSdkBackend(provider, compatible.chatModel(config.LLM_MODEL), {
      temperature: config.LLM_TEMPERATURE,
    }),
  };
}
