import fs from "node:fs/promises";
import path from "node:path";
import { InputError } from "../errors.js";
import type { PipelineState } from "./state.js";

export type DeckInput = NonNullable<PipelineState["deck"]>;

const MAX_DECK_CHARS = 60_000;

const FORMATS: Record<string, DeckInput["format"]> = {
  ".pdf": "pdf",
  ".md": "md",
  ".markdown": "md",
  ".txt": "txt"
};

/**
 * Resolves a deck path given at input time. A missing file or an unsupported
 * extension is an input error, raised before any stage runs.
 */
export async function inspectDeck(deckPath: string): Promise<DeckInput> {
  const abs = path.resolve(deckPath);
  const format = FORMATS[path.extname(abs).toLowerCase()];
  if (!format) throw new InputError(`Unsupported deck format: ${path.basename(abs)} (expected .pdf, .md or .txt)`);
  const stat = await fs.stat(abs).catch(() => null);
  if (!stat || !stat.isFile()) throw new InputError(`Deck not found: ${deckPath}`);
  return { path: abs, format };
}

async function pdfText(buffer: Buffer): Promise<string> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data: buffer });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

export async function extractDeckText(deck: DeckInput): Promise<string> {
  const buffer = await fs.readFile(deck.path);
  const text = deck.format === "pdf" ? await pdfText(buffer) : buffer.toString("utf8");
  const normalized = text.replace(/\r\n/g, "\n").replace(/\n{3,}/g, "\n\n").trim();
  return normalized.slice(0, MAX_DECK_CHARS);
}
