import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { loadConfig, type OrphanPolicy } from "../config.js";
import { InputError } from "../errors.js";
import { ARTIFACTS, readSectionFiles, sectionTitle, writeSectionFile, type SectionFile } from "../pipeline/artifacts.js";
import { assembleFinalDraft } from "../pipeline/assembly.js";
import { parseSection, splitCitationBlock } from "../pipeline/citations.js";
import { loadOutline, type SectionRegistry } from "../pipeline/outline.js";
import { loadState, saveState, type PipelineState, type SectionState } from "../pipeline/state.js";
import { copyDir, nowIso, runDirAbs, slug, tryReadJsonFile, writeJsonFile } from "../pipeline/utils.js";
import { allocateVersion, loadLedger, resolveVersion } from "../pipeline/versioning.js";
import type { CorrectionInstruction, CorrectionsFile, OutputMode } from "./config.js";
import type { CorrectionMatcher } from "./matcher.js";
import { findMatches } from "./matcher.js";
import type { SectionRewriter } from "./rewriter.js";
import { contextSample, flagUnsupportedClaims, splitMatches } from "./text.js";

export type CorrectionAnalysis = {
  instruction: CorrectionInstruction;
  /** The incorrect value first, then every variant the matcher produced. */
  forms: string[];
  /** Sections the instruction points at, by explicit hint or by field. */
  sectionHints: Array<{ number: number; name: string; filename: string }>;
};

export type SectionHit = {
  filename: string;
  number: number;
  name: string;
  instanceCount: number;
  matchedForms: string[];
  samples: string[];
};

export type ProtectedHit = {
  filename: string;
  location: "definition" | "quotation";
  form: string;
  sample: string;
};

export type LocateResult = {
  hits: SectionHit[];
  protectedHits: ProtectedHit[];
};

export type CorrectionOutcome = {
  instruction: CorrectionInstruction;
  analysis: CorrectionAnalysis;
  located: LocateResult;
  instancesCorrected: number;
  claimsFlagged: number;
};

export type CorrectionReport = {
  companySlug: string;
  preview: boolean;
  outputMode: OutputMode;
  sourceVersion: string;
  /** null for a preview or a no-op. */
  targetVersion: string | null;
  sectionsModified: number;
  instancesCorrected: number;
  modifiedFiles: string[];
  warnings: string[];
  corrections: CorrectionOutcome[];
  finalDraftPath: string | null;
};

export type CorrectionEngineOptions = {
  matcher: CorrectionMatcher;
  rewriter: SectionRewriter;
  preview?: boolean;
  outputMode?: OutputMode;
  sourceVersion?: string;
  orphanPolicy?: OrphanPolicy;
  log?: (message: string) => void;
  /** Called after a new version folder has been populated from its source. */
  onVersionCreated?: (companySlug: string, sourceVersion: string, targetVersion: string) => Promise<void>;
};

type WorkingSection = SectionFile & { name: string };

const AuditEntrySchema = z.object({
  at: z.string(),
  sourceVersion: z.string(),
  targetVersion: z.string(),
  outputMode: z.enum(["new_version", "in_place"]),
  dateCreated: z.string().nullable(),
  matcher: z.string(),
  rewriter: z.string(),
  corrections: z.array(
    z.object({
      type: z.string(),
      field: z.string().nullable(),
      incorrect: z.string(),
      correct: z.string(),
      sources: z.array(z.string()),
      forms: z.array(z.string()),
      instancesCorrected: z.number().int(),
      files: z.array(z.string())
    })
  ),
  warnings: z.array(z.string())
});

const AuditLogSchema = z.array(AuditEntrySchema);

export type CorrectionAuditEntry = z.infer<typeof AuditEntrySchema>;

export async function analyzeCorrection(
  instruction: CorrectionInstruction,
  matcher: CorrectionMatcher,
  registry: SectionRegistry
): Promise<CorrectionAnalysis> {
  const variants = await matcher.variants(instruction);
  const forms = [instruction.incorrect, ...variants.filter((v) => v.toLowerCase() !== instruction.incorrect.toLowerCase())];

  const hinted = new Map<number, { number: number; name: string; filename: string }>();
  for (const hint of instruction.sections) {
    const def = registry.resolve(hint);
    if (!def) throw new InputError(`Unknown section "${hint}" in correction "${instruction.incorrect}"`);
    hinted.set(def.number, { number: def.number, name: def.name, filename: def.filename });
  }
  if (instruction.field) {
    for (const def of registry.forField(instruction.field)) {
      hinted.set(def.number, { number: def.number, name: def.name, filename: def.filename });
    }
  }

  return { instruction, forms, sectionHints: [...hinted.values()].sort((a, b) => a.number - b.number) };
}

/**
 * Finds every instance of the analysed value in section bodies. Hits inside citation
 * definitions or quotations are returned separately and never counted.
 */
export function locateInstances(analysis: CorrectionAnalysis, sections: WorkingSection[]): LocateResult {
  const hits: SectionHit[] = [];
  const protectedHits: ProtectedHit[] = [];

  for (const section of sections) {
    const parsed = parseSection(section.content);
    const { body } = splitCitationBlock(section.content);
    const { editable, quoted } = splitMatches(body, analysis.forms);

    for (const q of quoted) {
      protectedHits.push({ filename: section.filename, location: "quotation", form: q.text, sample: contextSample(body, q.index, q.text.length) });
    }
    for (const [id, text] of parsed.definitions) {
      for (const m of findMatches(text, analysis.forms)) {
        protectedHits.push({ filename: section.filename, location: "definition", form: m.text, sample: `[^${id}]: ${text}` });
      }
    }

    if (editable.length === 0) continue;
    hits.push({
      filename: section.filename,
      number: section.number,
      name: section.name,
      instanceCount: editable.length,
      matchedForms: [...new Set(editable.map((m) => m.text))],
      samples: editable.slice(0, 3).map((m) => contextSample(body, m.index, m.text.length))
    });
  }

  return { hits, protectedHits };
}

/**
 * Rewrites one section's body. The citation block after it is kept byte for byte.
 */
export async function applyToSection(
  section: WorkingSection,
  analysis: CorrectionAnalysis,
  rewriter: SectionRewriter,
  companyName: string
): Promise<{ content: string; claimsFlagged: number }> {
  const { body, trailer } = splitCitationBlock(section.content);
  const { definitions } = parseSection(section.content);
  const rewritten = await rewriter.rewrite({
    companyName,
    section: { filename: section.filename, name: section.name },
    body,
    instruction: analysis.instruction,
    forms: analysis.forms
  });
  const flagged = flagUnsupportedClaims(rewritten, analysis.instruction.correct, definitions, analysis.forms);
  const text = flagged.text.replace(/\s+$/, "");
  return { content: trailer.length > 0 ? `${text}${trailer}` : `${text}\n`, claimsFlagged: flagged.flagged };
}

function protectedWarning(hit: ProtectedHit, incorrect: string): string {
  const where = hit.location === "definition" ? "a citation definition" : "a direct quotation";
  return `${hit.filename}: "${hit.form}" (for ${incorrect}) appears in ${where} and was not changed; review manually: ${hit.sample}`;
}

function updatedSectionState(
  state: PipelineState,
  registry: SectionRegistry,
  filename: string,
  content: string
): SectionState | null {
  const existing = state.sections[filename];
  if (existing) return { ...existing, content, provenance: "edited", updatedBy: "correction" };
  const def = registry.byFilename(filename);
  if (!def) return null;
  return { number: def.number, name: def.name, filename, content, provenance: "edited", updatedBy: "correction" };
}

async function appendAudit(runDir: string, entry: CorrectionAuditEntry): Promise<void> {
  const file = path.join(runDir, ARTIFACTS.correctionsAudit);
  const existing = (await tryReadJsonFile(file, AuditLogSchema)) ?? [];
  await writeJsonFile(file, [...existing, entry]);
}

/**
 * Applies a corrections file to a stored run: analyse, locate, rewrite, reassemble.
 *
 * Preview stops after locating. A file that matches nothing leaves every run untouched.
 * `new_version` copies the source run to the next version before writing; `in_place`
 * writes into the source run and only accepts the latest version.
 */
export async function runCorrections(file: CorrectionsFile, options: CorrectionEngineOptions): Promise<CorrectionReport> {
  const log = options.log ?? (() => undefined);
  const preview = options.preview ?? false;
  const outputMode = options.outputMode ?? file.outputMode;
  const companySlug = slug(file.companyName);
  const sourceVersion = await resolveVersion(companySlug, options.sourceVersion ?? file.sourceVersion);
  if (outputMode === "in_place" && !preview) {
    const ledger = await loadLedger(companySlug);
    if (ledger && ledger.latest !== sourceVersion) {
      throw new InputError(`${companySlug} ${sourceVersion} has been superseded by ${ledger.latest}; in_place corrections only apply to the latest version`);
    }
  }
  const sourceDir = runDirAbs(companySlug, sourceVersion);
  const state = await loadState(sourceDir);
  const registry = await loadOutline(state.outlineName);

  const files = await readSectionFiles(sourceDir);
  if (files.length === 0) throw new InputError(`${companySlug} ${sourceVersion} has no section files to correct`);
  const working: WorkingSection[] = files.map((f) => ({
    ...f,
    name: registry.byFilename(f.filename)?.name ?? sectionTitle(f.content, f.filename)
  }));
  const original = new Map(files.map((f) => [f.filename, f.content]));

  const warnings: string[] = [];
  const outcomes: CorrectionOutcome[] = [];

  for (const instruction of file.corrections) {
    const analysis = await analyzeCorrection(instruction, options.matcher, registry);
    const located = locateInstances(analysis, working);
    log(`"${instruction.incorrect}" -> "${instruction.correct}": ${located.hits.length} section(s), forms ${analysis.forms.join(" | ")}`);
    warnings.push(...located.protectedHits.map((h) => protectedWarning(h, instruction.incorrect)));

    let instancesCorrected = 0;
    let claimsFlagged = 0;
    if (!preview) {
      for (const hit of located.hits) {
        const idx = working.findIndex((w) => w.filename === hit.filename);
        if (idx === -1) continue;
        const applied = await applyToSection(working[idx], analysis, options.rewriter, file.companyName);
        working[idx] = { ...working[idx], content: applied.content };
        instancesCorrected += hit.instanceCount;
        claimsFlagged += applied.claimsFlagged;
      }
      if (claimsFlagged > 0) warnings.push(`"${instruction.correct}": ${claimsFlagged} claim(s) flagged [NEEDS CITATION]; their sources describe the old value`);
    }
    if (located.hits.length === 0) warnings.push(`No instances of "${instruction.incorrect}" found in ${companySlug} ${sourceVersion}`);
    outcomes.push({ instruction, analysis, located, instancesCorrected, claimsFlagged });
  }

  const modified = working.filter((w) => original.get(w.filename) !== w.content);
  const instancesCorrected = outcomes.reduce((n, o) => n + o.instancesCorrected, 0);
  const base = {
    companySlug,
    preview,
    outputMode,
    sourceVersion,
    warnings,
    corrections: outcomes
  };

  if (preview) {
    const wouldChange = new Set(outcomes.flatMap((o) => o.located.hits.map((h) => h.filename)));
    return {
      ...base,
      targetVersion: null,
      sectionsModified: wouldChange.size,
      instancesCorrected: outcomes.reduce((n, o) => n + o.located.hits.reduce((m, h) => m + h.instanceCount, 0), 0),
      modifiedFiles: [...wouldChange].sort(),
      finalDraftPath: null
    };
  }

  if (modified.length === 0) {
    warnings.push("No changes applied; the run was left untouched");
    return { ...base, targetVersion: null, sectionsModified: 0, instancesCorrected: 0, modifiedFiles: [], finalDraftPath: null };
  }

  let targetVersion = sourceVersion;
  let targetDir = sourceDir;
  if (outputMode === "new_version") {
    targetVersion = await allocateVersion(companySlug, "correction", sourceVersion);
    targetDir = runDirAbs(companySlug, targetVersion);
    await copyDir(sourceDir, targetDir);
    await fs.rm(path.join(targetDir, ARTIFACTS.run), { force: true });
    log(`Copied ${sourceVersion} to ${targetVersion}`);
  }

  const modifiedFiles: string[] = [];
  let nextState: PipelineState = { ...state, version: targetVersion };
  for (const section of modified) {
    modifiedFiles.push(await writeSectionFile(targetDir, section.filename, section.content));
    const updated = updatedSectionState(nextState, registry, section.filename, section.content);
    if (updated) nextState = { ...nextState, sections: { ...nextState.sections, [section.filename]: updated } };
  }

  const assembled = await assembleFinalDraft({
    runDir: targetDir,
    companyName: state.companyName,
    version: targetVersion,
    mode: state.mode,
    orphanPolicy: options.orphanPolicy ?? loadConfig().orphanPolicy
  });

  nextState = {
    ...nextState,
    finalDraft: {
      path: path.relative(targetDir, assembled.path),
      citationCount: assembled.citationCount,
      issueCount: assembled.issues.length,
      wordCount: assembled.wordCount
    },
    messages: [
      ...nextState.messages,
      ...outcomes.map(
        (o) => `correction: "${o.instruction.incorrect}" -> "${o.instruction.correct}" (${o.instancesCorrected} instance(s), ${o.located.hits.length} section(s))`
      )
    ]
  };
  await saveState(targetDir, nextState);

  await appendAudit(targetDir, {
    at: nowIso(),
    sourceVersion,
    targetVersion,
    outputMode,
    dateCreated: file.dateCreated,
    matcher: options.matcher.name,
    rewriter: options.rewriter.name,
    corrections: outcomes.map((o) => ({
      type: o.instruction.type,
      field: o.instruction.field,
      incorrect: o.instruction.incorrect,
      correct: o.instruction.correct,
      sources: o.instruction.sources,
      forms: o.analysis.forms,
      instancesCorrected: o.instancesCorrected,
      files: o.located.hits.map((h) => h.filename)
    })),
    warnings
  });

  if (outputMode === "new_version") await options.onVersionCreated?.(companySlug, sourceVersion, targetVersion);

  return {
    ...base,
    targetVersion,
    sectionsModified: modified.length,
    instancesCorrected,
    modifiedFiles: modifiedFiles.sort(),
    finalDraftPath: assembled.path
  };
}
