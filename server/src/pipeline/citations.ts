import { CitationIntegrityError } from "../errors.js";
import type { OrphanPolicy } from "../config.js";

const MARKER_RE = /\[\^(\d+)\](?!:)/g;
const DEFINITION_RE = /^\[\^(\d+)\]:[ \t]*(.*)$/;
const CONTINUATION_RE = /^(?: {2,}|\t)\S/;
const CITATION_HEADING_RE = /^#{2,4}\s*(citations|sources|references)\s*:?\s*$/i;
const DIVIDER_RE = /^(?:-{3,}|\*{3,}|_{3,})\s*$/;
const INTERCHANGE_RE = /^(.+?)\. \[(.+?)\]\((\S+?)\)\. (.+?)\. Published: (.+?) \| Updated: (.+)$/;

export const CITATIONS_HEADING = "### Citations";

export type CitationFields = {
  date: string;
  title: string;
  url: string;
  publisher: string;
  published: string;
  updated: string;
};

export type ParsedSection = {
  /** Section text with its trailing citation block removed. */
  body: string;
  /** Local marker ids in order of first inline appearance. */
  markers: string[];
  /** Local definitions, keyed by local id, each collapsed to one line. */
  definitions: Map<string, string>;
  duplicateDefinitions: string[];
};

export type SectionInput = {
  key: string;
  number: number;
  name?: string;
  content: string;
};

export type CitationIssue =
  | { kind: "orphan_marker"; section: string; marker: string; globalNumber: number }
  | { kind: "unreferenced_definition"; section: string; marker: string }
  | { kind: "duplicate_definition"; section: string; marker: string }
  | { kind: "malformed_definition"; section: string; marker: string; text: string };

export type GlobalCitation = {
  number: number;
  section: string;
  localId: string;
  text: string;
  orphan: boolean;
};

export type ConsolidationResult = {
  document: string;
  citations: GlobalCitation[];
  issues: CitationIssue[];
};

export function parseCitationFields(text: string): CitationFields | null {
  const m = INTERCHANGE_RE.exec(text.trim());
  if (!m) return null;
  return { date: m[1], title: m[2], url: m[3], publisher: m[4], published: m[5], updated: m[6] };
}

export function formatDefinitionLine(n: number | string, text: string): string {
  return `[^${n}]: ${text}`;
}

export function inlineMarkers(text: string): string[] {
  const out: string[] = [];
  for (const m of text.matchAll(MARKER_RE)) out.push(m[1]);
  return out;
}

function lastNonBlank(lines: string[]): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim().length > 0) return i;
  }
  return -1;
}

export function parseSection(content: string): ParsedSection {
  const lines = content.replace(/\r\n/g, "\n").split("\n");
  const kept: string[] = [];
  const definitions = new Map<string, string>();
  const duplicateDefinitions: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const m = DEFINITION_RE.exec(lines[i]);
    if (!m) {
      kept.push(lines[i]);
      continue;
    }
    const parts = [m[2].trim()];
    while (i + 1 < lines.length && CONTINUATION_RE.test(lines[i + 1])) {
      parts.push(lines[i + 1].trim());
      i++;
    }
    const text = parts.filter((p) => p.length > 0).join(" ");
    if (definitions.has(m[1])) duplicateDefinitions.push(m[1]);
    else definitions.set(m[1], text);
  }

  // Trailing block: optional divider, then a citations heading, then the (now removed) definitions.
  let end = lastNonBlank(kept);
  if (end >= 0 && CITATION_HEADING_RE.test(kept[end].trim())) {
    kept.length = end;
    end = lastNonBlank(kept);
    if (end >= 0 && DIVIDER_RE.test(kept[end].trim())) kept.length = end;
  }

  const body = kept.join("\n").replace(/\s+$/, "");
  const markers: string[] = [];
  for (const id of inlineMarkers(body)) {
    if (!markers.includes(id)) markers.push(id);
  }
  return { body, markers, definitions, duplicateDefinitions };
}

/**
 * Splits a section into its body and the trailing citation block, byte for byte:
 * `body + trailer === content`. The trailer starts at the divider or heading above the
 * first definition (or at the first definition when there is neither).
 */
export function splitCitationBlock(content: string): { body: string; trailer: string } {
  const lines = content.split("\n").map((l) => l.replace(/\r$/, ""));
  let start = lines.findIndex((l) => DEFINITION_RE.test(l));
  if (start === -1) start = lines.length;

  let i = start - 1;
  while (i >= 0 && lines[i].trim() === "") i--;
  if (i >= 0 && CITATION_HEADING_RE.test(lines[i].trim())) {
    start = i;
    i--;
    while (i >= 0 && lines[i].trim() === "") i--;
    if (i >= 0 && DIVIDER_RE.test(lines[i].trim())) start = i;
  }

  const rawLines = content.split("\n");
  const offset = rawLines.slice(0, start).reduce((n, l) => n + l.length + 1, 0);
  const body = content.slice(0, Math.min(offset, content.length)).replace(/\s+$/, "");
  return { body, trailer: content.slice(body.length) };
}

const REMOVABLE_MARKER_RE = /[ \t]*\[\^(\d+)\](?!:)/g;

/**
 * Drops the given local citations: their inline markers, their definitions and any
 * continuation lines. A citation block left with no definitions is removed too.
 */
export function removeCitations(content: string, ids: ReadonlySet<string>): string {
  if (ids.size === 0) return content;
  const lines = content.split("\n");
  const kept: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const m = DEFINITION_RE.exec(lines[i].replace(/\r$/, ""));
    if (m && ids.has(m[1])) {
      while (i + 1 < lines.length && CONTINUATION_RE.test(lines[i + 1])) i++;
      const previousBlank = kept.length === 0 || kept[kept.length - 1].trim() === "";
      if (previousBlank && i + 1 < lines.length && lines[i + 1].trim() === "") i++;
      continue;
    }
    kept.push(m ? lines[i] : lines[i].replace(REMOVABLE_MARKER_RE, (whole: string, id: string) => (ids.has(id) ? "" : whole)));
  }

  const text = kept.join("\n");
  const { body, trailer } = splitCitationBlock(text);
  const hasDefinitions = trailer.split("\n").some((l) => DEFINITION_RE.test(l.replace(/\r$/, "")));
  return trailer.length > 0 && !hasDefinitions ? `${body}\n` : text;
}

function orphanPlaceholder(section: SectionInput, localId: string): string {
  return `[CITATION NEEDED: no source was provided for local marker ${localId} in ${section.name ?? section.key}]`;
}

export function renderDocument(bodies: string[], definitionLines: string[]): string {
  const text = bodies.filter((b) => b.length > 0).join("\n\n");
  if (definitionLines.length === 0) return `${text}\n`;
  return `${text}\n\n---\n\n${CITATIONS_HEADING}\n\n${definitionLines.join("\n\n")}\n`;
}

/**
 * Renumbers every section's local citations into one global sequence.
 *
 * Numbers are assigned by first inline appearance, walking sections in ascending
 * number order. Identical sources cited from two sections keep two numbers.
 */
export function consolidateCitations(sections: SectionInput[], options: { orphanPolicy?: OrphanPolicy } = {}): ConsolidationResult {
  const orphanPolicy = options.orphanPolicy ?? "flag";
  const ordered = [...sections].sort((a, b) => a.number - b.number);
  const citations: GlobalCitation[] = [];
  const issues: CitationIssue[] = [];
  const bodies: string[] = [];
  let next = 0;

  for (const section of ordered) {
    const parsed = parseSection(section.content);
    const mapping = new Map<string, number>();

    for (const localId of parsed.markers) {
      next += 1;
      mapping.set(localId, next);
      const def = parsed.definitions.get(localId);
      if (def === undefined || def.length === 0) {
        issues.push({ kind: "orphan_marker", section: section.key, marker: localId, globalNumber: next });
        citations.push({ number: next, section: section.key, localId, text: orphanPlaceholder(section, localId), orphan: true });
        continue;
      }
      if (!parseCitationFields(def) && !def.startsWith("[CITATION NEEDED")) {
        issues.push({ kind: "malformed_definition", section: section.key, marker: localId, text: def });
      }
      citations.push({ number: next, section: section.key, localId, text: def, orphan: false });
    }

    for (const id of parsed.definitions.keys()) {
      if (!mapping.has(id)) issues.push({ kind: "unreferenced_definition", section: section.key, marker: id });
    }
    for (const id of parsed.duplicateDefinitions) {
      issues.push({ kind: "duplicate_definition", section: section.key, marker: id });
    }

    // One pass over the body, so a rewritten marker is never rewritten again.
    bodies.push(parsed.body.replace(MARKER_RE, (whole, id: string) => {
      const n = mapping.get(id);
      return n === undefined ? whole : `[^${n}]`;
    }));
  }

  if (orphanPolicy === "fail") {
    const orphans = issues.filter((i) => i.kind === "orphan_marker");
    if (orphans.length > 0) {
      throw new CitationIntegrityError(orphans.map((o) => `${o.section}: marker [^${o.marker}] has no definition`));
    }
  }

  const document = renderDocument(
    bodies,
    citations.map((c) => formatDefinitionLine(c.number, c.text))
  );
  return { document, citations, issues };
}

/**
 * Checks an assembled document: inline markers are exactly 1..M by first appearance,
 * each has exactly one definition, and definitions are listed in ascending order.
 */
export function verifyConsolidatedDocument(document: string): string[] {
  const problems: string[] = [];
  const lines = document.replace(/\r\n/g, "\n").split("\n");
  const defOrder: number[] = [];
  for (const line of lines) {
    const m = DEFINITION_RE.exec(line);
    if (m) defOrder.push(Number(m[1]));
  }

  const parsed = parseSection(document);
  const firstSeen = parsed.markers.map(Number);
  const m = firstSeen.length;

  firstSeen.forEach((n, i) => {
    if (n !== i + 1) problems.push(`marker [^${n}] appears where [^${i + 1}] was expected`);
  });

  const counts = new Map<number, number>();
  for (const n of defOrder) counts.set(n, (counts.get(n) ?? 0) + 1);
  for (const [n, c] of counts) {
    if (c > 1) problems.push(`definition [^${n}] appears ${c} times`);
    if (n < 1 || n > m) problems.push(`definition [^${n}] is not referenced inline`);
  }
  for (let n = 1; n <= m; n++) {
    if (!counts.has(n)) problems.push(`marker [^${n}] has no definition`);
  }
  for (let i = 1; i < defOrder.length; i++) {
    if (defOrder[i] < defOrder[i - 1]) {
      problems.push("definitions are not in ascending order");
      break;
    }
  }
  return problems;
}

export function assertConsolidated(document: string): void {
  const problems = verifyConsolidatedDocument(document);
  if (problems.length > 0) throw new CitationIntegrityError(problems);
}

/**
 * Renders a section back to its on-disk form: body, then a local citation block.
 */
export function renderSection(body: string, definitions: Array<[string, string]>): string {
  const trimmed = body.replace(/\s+$/, "");
  if (definitions.length === 0) return `${trimmed}\n`;
  const defs = definitions.map(([id, text]) => formatDefinitionLine(id, text)).join("\n\n");
  return `${trimmed}\n\n${CITATIONS_HEADING}\n\n${defs}\n`;
}
