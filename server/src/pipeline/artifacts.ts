import fs from "node:fs/promises";
import path from "node:path";
import type { DeckAnalysis, Research, Validation } from "./state.js";
import { writeJsonFile, writeTextFile } from "./utils.js";

export const ARTIFACTS = {
  deckAnalysisJson: "0-deck-analysis.json",
  deckAnalysisMd: "0-deck-analysis.md",
  deckSectionsDir: "0-deck-sections",
  researchJson: "1-research.json",
  researchMd: "1-research.md",
  sectionsDir: "2-sections",
  sourceCheckJson: "3-source-check.json",
  factCheckJson: "3-fact-check.json",
  validationJson: "3-validation.json",
  validationMd: "3-validation.md",
  finalDraft: "4-final-draft.md",
  citationsJson: "4-citations.json",
  scorecardJson: "5-scorecard.json",
  scorecardMd: "5-scorecard.md",
  state: "state.json",
  run: "run.json",
  correctionsAudit: "corrections-audit.json"
} as const;

const SECTION_FILE_RE = /^(\d{2})-[a-z0-9-]+\.md$/;

export type SectionFile = {
  filename: string;
  number: number;
  content: string;
};

/**
 * Section files always open with `# <Section Name>`.
 */
export function withSectionHeader(name: string, content: string): string {
  const trimmed = content.replace(/^\s+/, "");
  const firstLine = trimmed.split("\n", 1)[0] ?? "";
  if (/^#\s+\S/.test(firstLine)) return `# ${name}${trimmed.slice(firstLine.length)}`;
  return `# ${name}\n\n${trimmed}`;
}

export async function writeSectionFile(runDir: string, filename: string, content: string, dir: string = ARTIFACTS.sectionsDir): Promise<string> {
  const rel = `${dir}/${filename}`;
  await writeTextFile(path.join(runDir, dir, filename), content);
  return rel;
}

export async function readSectionFiles(runDir: string, dir: string = ARTIFACTS.sectionsDir): Promise<SectionFile[]> {
  const abs = path.join(runDir, dir);
  const entries = await fs.readdir(abs, { withFileTypes: true }).catch(() => []);
  const out: SectionFile[] = [];
  for (const ent of entries) {
    if (!ent.isFile()) continue;
    const m = SECTION_FILE_RE.exec(ent.name);
    if (!m) continue;
    out.push({ filename: ent.name, number: Number(m[1]), content: await fs.readFile(path.join(abs, ent.name), "utf8") });
  }
  return out.sort((a, b) => a.number - b.number || a.filename.localeCompare(b.filename));
}

export function sectionTitle(content: string, fallback: string): string {
  const m = /^#\s+(.+)$/m.exec(content);
  return m ? m[1].trim() : fallback;
}

export function wordCount(text: string): number {
  const words = text
    .replace(/\[\^\d+\]/g, " ")
    .split(/\s+/)
    .filter((w) => /[A-Za-z0-9]/.test(w));
  return words.length;
}

export function renderDeckAnalysisMarkdown(a: DeckAnalysis): string {
  const lines = [`# Deck Analysis: ${a.companyName}`, "", a.summary, "", "## Key Facts", ""];
  for (const f of a.keyFacts) lines.push(`- **${f.label}:** ${f.value}`);
  if (a.dataGaps.length > 0) {
    lines.push("", "## Data Gaps", "");
    for (const g of a.dataGaps) lines.push(`- ${g}`);
  }
  return lines.join("\n");
}

export function renderResearchMarkdown(companyName: string, r: Research): string {
  const lines = [`# Research: ${companyName}`, "", r.summary, ""];
  if (r.companyUrl) lines.push(`Website: ${r.companyUrl}`, "");
  if (r.findings.length > 0) {
    lines.push("## Findings", "");
    for (const f of r.findings) {
      const refs = f.sourceIndexes.map((i) => `[${i + 1}]`).join("");
      lines.push(`- **${f.topic}:** ${f.detail}${refs ? ` ${refs}` : ""}`);
    }
    lines.push("");
  }
  if (r.metrics.length > 0) {
    lines.push("## Metrics", "", "| Metric | Value |", "|---|---|");
    for (const m of r.metrics) lines.push(`| ${m.label} | ${m.value} |`);
    lines.push("");
  }
  if (r.sources.length > 0) {
    lines.push("## Sources", "");
    r.sources.forEach((s, i) => lines.push(`${i + 1}. [${s.title}](${s.url}) (${s.publisher}, ${s.published})`));
  }
  return lines.join("\n");
}

export function renderValidationMarkdown(v: Validation): string {
  const lines = [
    `# Validation (revision ${v.revision})`,
    "",
    `Overall score: ${v.overallScore.toFixed(1)}/10`,
    `Needs revision: ${v.needsRevision ? "yes" : "no"}`,
    ""
  ];
  const list = (title: string, items: string[]) => {
    if (items.length === 0) return;
    lines.push(`## ${title}`, "");
    for (const item of items) lines.push(`- ${item}`);
    lines.push("");
  };
  list("Issues", v.issues);
  list("Suggestions", v.suggestions);
  list("Strengths", v.strengths);
  const categories = Object.entries(v.categoryScores);
  if (categories.length > 0) {
    lines.push("## Category Scores", "");
    for (const [k, score] of categories) lines.push(`- ${k}: ${score}`);
  }
  return lines.join("\n");
}

export async function writeJsonAndMarkdown(runDir: string, jsonName: string, data: unknown, mdName: string, markdown: string): Promise<void> {
  await writeJsonFile(path.join(runDir, jsonName), data);
  await writeTextFile(path.join(runDir, mdName), markdown);
}
