import { inlineMarkers } from "../pipeline/citations.js";
import { findMatches, type TextMatch } from "./matcher.js";

export const NEEDS_CITATION = "[NEEDS CITATION]";

type Span = { start: number; end: number };

const QUOTE_RES = [/"[^"\n]+"/g, /“[^”\n]+”/g, /^>.*$/gm];

/**
 * Direct quotations and blockquote lines. A quote records what someone said, so a stale
 * figure inside one is reported for review rather than rewritten.
 */
export function quotedSpans(text: string): Span[] {
  const spans: Span[] = [];
  for (const re of QUOTE_RES) {
    for (const m of text.matchAll(re)) {
      const start = m.index ?? 0;
      spans.push({ start, end: start + m[0].length });
    }
  }
  return spans;
}

export function insideSpan(spans: Span[], index: number): boolean {
  return spans.some((s) => index >= s.start && index < s.end);
}

export function splitMatches(text: string, forms: string[]): { editable: TextMatch[]; quoted: TextMatch[] } {
  const spans = quotedSpans(text);
  const editable: TextMatch[] = [];
  const quoted: TextMatch[] = [];
  for (const m of findMatches(text, forms)) {
    (insideSpan(spans, m.index) ? quoted : editable).push(m);
  }
  return { editable, quoted };
}

/**
 * Replaces every editable match; quoted matches are left alone.
 */
export function replaceEditable(text: string, forms: string[], replacement: string): { text: string; count: number } {
  const { editable } = splitMatches(text, forms);
  let out = text;
  for (const m of [...editable].reverse()) {
    out = out.slice(0, m.index) + replacement + out.slice(m.index + m.text.length);
  }
  return { text: out, count: editable.length };
}

export function contextSample(text: string, index: number, length: number, radius = 60): string {
  const start = Math.max(0, index - radius);
  const end = Math.min(text.length, index + length + radius);
  const snippet = text.slice(start, end).replace(/\s+/g, " ").trim();
  return `${start > 0 ? "…" : ""}${snippet}${end < text.length ? "…" : ""}`;
}

const SENTENCE_END_RE = /[.!?]["”')]*(?:\[\^\d+\])*(?=\s|$)|\n/g;

export function sentenceSpan(text: string, index: number): Span {
  let start = 0;
  let end = text.length;
  for (const m of text.matchAll(SENTENCE_END_RE)) {
    const at = m.index ?? 0;
    const stop = at + m[0].length;
    if (stop <= index) {
      start = stop;
      continue;
    }
    end = m[0] === "\n" ? at : stop;
    break;
  }
  return { start, end };
}

/**
 * After a correction, a sentence stating the corrected value whose every citation describes
 * the old value no longer has support; it gets a visible flag after its markers.
 */
export function flagUnsupportedClaims(
  body: string,
  correctValue: string,
  definitions: Map<string, string>,
  staleForms: string[]
): { text: string; flagged: number } {
  const stale = (id: string) => {
    const def = definitions.get(id);
    return def !== undefined && findMatches(def, staleForms).length > 0;
  };

  const insertAt = new Set<number>();
  for (const m of findMatches(body, [correctValue])) {
    const span = sentenceSpan(body, m.index);
    const sentence = body.slice(span.start, span.end);
    const markers = inlineMarkers(sentence);
    if (markers.length === 0 || !markers.every(stale)) continue;
    if (body.slice(span.end).startsWith(` ${NEEDS_CITATION}`) || sentence.includes(NEEDS_CITATION)) continue;
    insertAt.add(span.end);
  }

  let out = body;
  for (const at of [...insertAt].sort((a, b) => b - a)) {
    out = `${out.slice(0, at)} ${NEEDS_CITATION}${out.slice(at)}`;
  }
  return { text: out, flagged: insertAt.size };
}
