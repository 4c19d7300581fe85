import { getEncoding, type Tiktoken } from "js-tiktoken";
import { TOKENIZER_ENCODING } from "./config";
import { ConfigError } from "./errors";

export interface ChunkerOptions {
  /** Maximum tokens per chunk (default 400). */
  maxTokens?: number;
  /** Tokens shared with the previous chunk (default 60). Clamped to maxTokens - 1. */
  overlap?: number;
}

/** A chunk as a half-open token range `[start, end)` plus its decoded text. */
export interface TokenSpan {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

// Encodings are immutable lookup tables; build each one once per process.
let sharedEncoding: Tiktoken | null = null;
function encoding(): Tiktoken {
  if (!sharedEncoding) sharedEncoding = getEncoding(TOKENIZER_ENCODING);
  return sharedEncoding;
}

/**
 * Splits text into overlapping token-bounded chunks. Sizing is in tokenizer
 * units (cl100k_base) so chunk budgets line up with what the generation model
 * counts, independent of characters or words.
 */
export class Chunker {
  public readonly maxTokens: number;
  public readonly overlap: number;
  private readonly enc: Tiktoken;

  public constructor(opts: ChunkerOptions = {}) {
    const maxTokens = opts.maxTokens ?? 400;
    let overlap = opts.overlap ?? 60;
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw new ConfigError(`Chunk size must be a positive integer (got ${maxTokens})`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new ConfigError(`Chunk overlap must be a non-negative integer (got ${overlap})`);
    }
    // Safety: overlap < size keeps the step positive.
    if (overlap >= maxTokens) {
      const clamped = maxTokens - 1;
      console.error(
        `[INGEST] Chunk overlap (=${overlap}) >= chunk size (=${maxTokens}). Using overlap ${clamped}.`,
      );
      overlap = clamped;
    }
    this.maxTokens = maxTokens;
    this.overlap = overlap;
    this.enc = encoding();
  }

  /** Distance between consecutive chunk start offsets. Always >= 1. */
  public get step(): number {
    return this.maxTokens - this.overlap;
  }

  public encode(text: string): number[] {
    // No special tokens: "<|endoftext|>" in a document is just text.
    return this.enc.encode(text, [], []);
  }

  public countTokens(text: string): number {
    return this.encode(text).length;
  }

  /**
   * Token spans covering the whole text. The last span may be shorter than
   * maxTokens; no span is emitted once the previous one reached the end.
   */
  public spans(text: string): TokenSpan[] {
    const tokens = this.encode(text);
    const out: TokenSpan[] = [];
    for (let start = 0; start < tokens.length; start += this.step) {
      const end = Math.min(start + this.maxTokens, tokens.length);
      out.push({ start, end, text: this.enc.decode(tokens.slice(start, end)) });
      if (end === tokens.length) break;
    }
    return out;
  }

  public split(text: string): string[] {
    return this.spans(text).map((s) => s.text);
  }
}
