/**
 * Format-polymorphic text extraction for the ingestion scan.
 *
 * Every supported format is reduced to flat text before chunking:
 *   - .txt / .md : read as UTF-8
 *   - .pdf       : pdf-parse (all pages, page text joined by the parser)
 *   - .docx      : mammoth raw text (paragraphs separated by blank lines)
 *
 * A PDF or Word document that cannot be parsed is logged and yields "", so the
 * scan skips it the same way it skips an empty file.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import mammoth from "mammoth";

export type Extractor = (absPath: string) => Promise<string>;

async function readPlainText(absPath: string): Promise<string> {
  return fs.readFile(absPath, "utf8");
}

async function readPdf(absPath: string): Promise<string> {
  const parser = new PDFParse({ data: await fs.readFile(absPath) });
  try {
    const result = await parser.getText();
    return result.text || "";
  } finally {
    await parser.destroy();
  }
}

async function readDocx(absPath: string): Promise<string> {
  const result = await mammoth.extractRawText({ path: absPath });
  return result.value;
}

const EXTRACTORS: Record<string, Extractor> = {
  ".txt": readPlainText,
  ".md": readPlainText,
  ".pdf": readPdf,
  ".docx": readDocx,
};

/** Binary formats whose parse failures are tolerated (treated as empty). */
const LENIENT = new Set([".pdf", ".docx"]);

/**
 * Extract flat text from a document, dispatching on its extension.
 *
 * @throws Error for unsupported extensions and for unreadable plain-text files.
 */
export async function extractText(absPath: string, verbose = false): Promise<string> {
  const ext = path.extname(absPath).toLowerCase();
  const extractor = EXTRACTORS[ext];
  if (!extractor) throw new Error(`Unsupported document type '${ext || "(none)"}': ${absPath}`);
  if (verbose) console.error(`[INGEST][verbose] Extracting text from ${path.basename(absPath)}...`);
  try {
    return await extractor(absPath);
  } catch (e) {
    if (!LENIENT.has(ext)) throw e;
    console.error(`[INGEST] Failed to extract text from ${path.basename(absPath)}:`, e);
    return "";
  }
}
