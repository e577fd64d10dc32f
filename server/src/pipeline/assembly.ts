import path from "node:path";
import type { OrphanPolicy } from "../config.js";
import { ARTIFACTS, readSectionFiles, sectionTitle, wordCount, type SectionFile } from "./artifacts.js";
import { assertConsolidated, consolidateCitations, type CitationIssue, type SectionInput } from "./citations.js";
import { loadState, saveState } from "./state.js";
import { nowIso, writeJsonFile, writeTextFile } from "./utils.js";

export type AssemblyResult = {
  path: string;
  document: string;
  sectionCount: number;
  citationCount: number;
  wordCount: number;
  issues: CitationIssue[];
};

export function titleHeader(companyName: string, version: string, mode: "consider" | "justify"): string {
  const modeLabel = mode === "justify" ? "Justify" : "Consider";
  return `# ${companyName} Investment Memo\n\n*Version ${version} | Mode: ${modeLabel}*`;
}

/**
 * GitHub-style heading anchor: lowercase, punctuation dropped, spaces to hyphens.
 */
export function headingAnchor(heading: string): string {
  return heading
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .replace(/\s/g, "-");
}

export function tableOfContents(files: SectionFile[]): string {
  const entries = files.map((f, i) => {
    const title = sectionTitle(f.content, f.filename);
    return `${i + 1}. [${title}](#${headingAnchor(title)})`;
  });
  return ["## Table of Contents", "", ...entries].join("\n");
}

function demoteTitle(content: string): string {
  return content.replace(/^#\s+/, "## ");
}

export function describeIssue(issue: CitationIssue): string {
  switch (issue.kind) {
    case "orphan_marker":
      return `${issue.section}: inline [^${issue.marker}] has no definition (flagged as [^${issue.globalNumber}])`;
    case "unreferenced_definition":
      return `${issue.section}: definition [^${issue.marker}] is never cited and was dropped`;
    case "duplicate_definition":
      return `${issue.section}: definition [^${issue.marker}] appears more than once; the first was kept`;
    case "malformed_definition":
      return `${issue.section}: definition [^${issue.marker}] is not in the standard citation format`;
  }
}

/**
 * Reads `2-sections/*.md` in section order, renumbers citations globally and writes
 * `4-final-draft.md` (title, table of contents, sections, citations) plus the
 * `4-citations.json` mapping.
 */
export async function assembleFinalDraft(args: {
  runDir: string;
  companyName: string;
  version: string;
  mode: "consider" | "justify";
  orphanPolicy: OrphanPolicy;
}): Promise<AssemblyResult> {
  const files = await readSectionFiles(args.runDir);
  const inputs: SectionInput[] = [
    { key: "title", number: 0, name: "Title", content: titleHeader(args.companyName, args.version, args.mode) },
    ...(files.length > 0 ? [{ key: "toc", number: 0, name: "Table of Contents", content: tableOfContents(files) }] : []),
    ...files.map((f) => ({ key: f.filename, number: f.number, content: demoteTitle(f.content) }))
  ];

  const result = consolidateCitations(inputs, { orphanPolicy: args.orphanPolicy });
  assertConsolidated(result.document);

  const outPath = path.join(args.runDir, ARTIFACTS.finalDraft);
  await writeTextFile(outPath, result.document);
  await writeJsonFile(path.join(args.runDir, ARTIFACTS.citationsJson), {
    generatedAt: nowIso(),
    citations: result.citations.map((c) => ({ number: c.number, section: c.section, localId: c.localId, orphan: c.orphan })),
    issues: result.issues
  });

  return {
    path: outPath,
    document: result.document,
    sectionCount: files.length,
    citationCount: result.citations.length,
    wordCount: wordCount(result.document),
    issues: result.issues
  };
}

/**
 * Re-assembles a stored run from its section files and records the result in `state.json`.
 */
export async function assembleStoredRun(runDir: string, orphanPolicy: OrphanPolicy): Promise<AssemblyResult> {
  const state = await loadState(runDir);
  const result = await assembleFinalDraft({
    runDir,
    companyName: state.companyName,
    version: state.version,
    mode: state.mode,
    orphanPolicy
  });
  await saveState(runDir, {
    ...state,
    finalDraft: {
      path: path.relative(runDir, result.path),
      citationCount: result.citationCount,
      issueCount: result.issues.length,
      wordCount: result.wordCount
    },
    messages: [...state.messages, ...result.issues.map((i) => `citations: ${describeIssue(i)}`)]
  });
  return result;
}
