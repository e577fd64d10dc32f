import path from "node:path";
import { z } from "zod";
import { InputError } from "../errors.js";
import { nowIso, readJsonFile, writeJsonFile } from "./utils.js";

export const STAGES = [
  "deck_analyst",
  "research",
  "write",
  "enrich_trademark",
  "enrich_socials",
  "enrich_links",
  "enrich_tables",
  "scorecard",
  "citation_enrichment",
  "revise_summaries",
  "clean_sources",
  "fact_check",
  "validate",
  "revise",
  "finalize",
  "escalate_to_human"
] as const;

export type StageName = (typeof STAGES)[number];

export const LINEAR_STAGES = [
  "deck_analyst",
  "research",
  "write",
  "enrich_trademark",
  "enrich_socials",
  "enrich_links",
  "enrich_tables",
  "scorecard",
  "citation_enrichment",
  "revise_summaries",
  "clean_sources",
  "fact_check"
] as const satisfies readonly StageName[];

export const CRITICAL_STAGES: ReadonlySet<StageName> = new Set<StageName>([
  "deck_analyst",
  "research",
  "write",
  "validate",
  "revise",
  "finalize",
  "escalate_to_human"
]);

export const StageNameSchema = z.enum(STAGES);

export const DeckFormatSchema = z.enum(["pdf", "md", "txt"]);

export const SourceSchema = z.object({
  title: z.string(),
  url: z.string(),
  publisher: z.string(),
  published: z.string(),
  updated: z.string().nullable()
});

export const DeckAnalysisSchema = z.object({
  companyName: z.string(),
  summary: z.string(),
  keyFacts: z.array(z.object({ label: z.string(), value: z.string() })),
  dataGaps: z.array(z.string()),
  sectionDrafts: z.array(z.object({ filename: z.string(), name: z.string() }))
});

export const ResearchSchema = z.object({
  summary: z.string(),
  companyUrl: z.string().nullable(),
  findings: z.array(z.object({ topic: z.string(), detail: z.string(), sourceIndexes: z.array(z.number().int()) })),
  metrics: z.array(z.object({ label: z.string(), value: z.string(), sourceIndex: z.number().int().nullable() })),
  sources: z.array(SourceSchema)
});

export const SectionProvenanceSchema = z.enum(["deck", "research", "edited"]);

export const SectionStateSchema = z.object({
  number: z.number().int().positive(),
  name: z.string(),
  filename: z.string(),
  content: z.string(),
  provenance: SectionProvenanceSchema,
  updatedBy: StageNameSchema.or(z.literal("correction"))
});

export const ValidationSchema = z.object({
  overallScore: z.number().min(0).max(10),
  needsRevision: z.boolean(),
  issues: z.array(z.string()),
  suggestions: z.array(z.string()),
  strengths: z.array(z.string()),
  categoryScores: z.record(z.number()),
  revision: z.number().int().nonnegative()
});

export const ScorecardResultSchema = z.object({
  scorecardId: z.string(),
  scores: z.array(z.object({ dimension: z.string(), score: z.number(), rationale: z.string() })),
  overall: z.number()
});

export const SourceCleanupSchema = z.object({
  urlsChecked: z.number().int().nonnegative(),
  citationsRemoved: z.number().int().nonnegative(),
  removed: z.array(z.object({ filename: z.string(), marker: z.string(), url: z.string(), reason: z.string() }))
});

export const SectionFactCheckSchema = z.object({
  filename: z.string(),
  name: z.string(),
  totalClaims: z.number().int().nonnegative(),
  verified: z.number().int().nonnegative(),
  unsourced: z.number().int().nonnegative(),
  suspicious: z.number().int().nonnegative(),
  score: z.number().min(0).max(1),
  requiresRewrite: z.boolean(),
  /** High-risk claims the research does not support. */
  flagged: z.array(z.string())
});

export const FactCheckSchema = z.object({
  /** The revision round the check ran against; validation ignores a stale check. */
  revision: z.number().int().nonnegative(),
  overallScore: z.number().min(0).max(1),
  sections: z.array(SectionFactCheckSchema)
});

export const SocialsSchema = z.object({
  website: z.string().nullable(),
  linkedin: z.string().nullable(),
  twitter: z.string().nullable(),
  crunchbase: z.string().nullable()
});

export const StageHistoryEntrySchema = z.object({
  stage: StageNameSchema,
  status: z.enum(["done", "failed"]),
  at: z.string(),
  error: z.string().nullable()
});

export const PipelineStateSchema = z
  .object({
    companyName: z.string().min(1),
    investmentType: z.enum(["direct", "fund"]),
    mode: z.enum(["consider", "justify"]),
    version: z.string(),
    createdAt: z.string(),

    deck: z.object({ path: z.string(), format: DeckFormatSchema }).nullable(),
    outlineName: z.string(),
    scorecardName: z.string().nullable(),
    companyUrl: z.string().nullable(),
    companyDescription: z.string().nullable(),
    companyStage: z.string().nullable(),
    researchNotes: z.string().nullable(),
    trademark: z.object({ light: z.string().nullable(), dark: z.string().nullable() }).nullable(),

    deckAnalysis: DeckAnalysisSchema.nullable(),
    research: ResearchSchema.nullable(),
    sections: z.record(SectionStateSchema),
    socials: SocialsSchema.nullable(),
    scorecard: ScorecardResultSchema.nullable(),
    citationEnrichment: z.object({ sectionsEnriched: z.number().int(), citationsAdded: z.number().int() }).nullable(),
    sourceCleanup: SourceCleanupSchema.nullable(),
    factCheck: FactCheckSchema.nullable(),
    validation: ValidationSchema.nullable(),
    revisionCount: z.number().int().nonnegative(),

    outcome: z.enum(["finalized", "escalated"]).nullable(),
    finalDraft: z
      .object({ path: z.string(), citationCount: z.number().int(), issueCount: z.number().int(), wordCount: z.number().int() })
      .nullable(),

    stageHistory: z.array(StageHistoryEntrySchema),
    messages: z.array(z.string())
  })
  .strict();

export type PipelineState = z.infer<typeof PipelineStateSchema>;
export type SectionState = z.infer<typeof SectionStateSchema>;
export type Validation = z.infer<typeof ValidationSchema>;
export type Research = z.infer<typeof ResearchSchema>;
export type DeckAnalysis = z.infer<typeof DeckAnalysisSchema>;
export type Source = z.infer<typeof SourceSchema>;
export type SourceCleanup = z.infer<typeof SourceCleanupSchema>;
export type SectionFactCheck = z.infer<typeof SectionFactCheckSchema>;
export type FactCheck = z.infer<typeof FactCheckSchema>;
export type StageHistoryEntry = z.infer<typeof StageHistoryEntrySchema>;

type IdentityKey = "companyName" | "investmentType" | "mode" | "version" | "createdAt" | "stageHistory";
export type WritableKey = Exclude<keyof PipelineState, IdentityKey>;
export type StageUpdate = Partial<Pick<PipelineState, WritableKey>>;

export type RunInputs = {
  companyName: string;
  investmentType: PipelineState["investmentType"];
  mode: PipelineState["mode"];
  version: string;
  deck?: PipelineState["deck"];
  outlineName?: string;
  scorecardName?: string | null;
  companyUrl?: string | null;
  companyDescription?: string | null;
  companyStage?: string | null;
  researchNotes?: string | null;
  trademark?: PipelineState["trademark"];
};

export function initialState(input: RunInputs): PipelineState {
  return PipelineStateSchema.parse({
    companyName: input.companyName,
    investmentType: input.investmentType,
    mode: input.mode,
    version: input.version,
    createdAt: nowIso(),
    deck: input.deck ?? null,
    outlineName: input.outlineName ?? input.investmentType,
    scorecardName: input.scorecardName ?? null,
    companyUrl: input.companyUrl ?? null,
    companyDescription: input.companyDescription ?? null,
    companyStage: input.companyStage ?? null,
    researchNotes: input.researchNotes ?? null,
    trademark: input.trademark ?? null,
    deckAnalysis: null,
    research: null,
    sections: {},
    socials: null,
    scorecard: null,
    citationEnrichment: null,
    sourceCleanup: null,
    factCheck: null,
    validation: null,
    revisionCount: 0,
    outcome: null,
    finalDraft: null,
    stageHistory: [],
    messages: []
  });
}

/**
 * Applies one stage's partial update. `messages` appends, `sections` merges per filename,
 * every other key is overwritten. A stage may only write the keys it declares.
 */
export function mergeStageUpdate(
  state: PipelineState,
  update: StageUpdate,
  allowed: readonly WritableKey[],
  stage: string
): PipelineState {
  const allowedSet = new Set<string>(allowed);
  const illegal = Object.keys(update).filter((k) => k !== "messages" && !allowedSet.has(k));
  if (illegal.length > 0) {
    throw new InputError(`${stage} wrote undeclared state keys: ${illegal.join(", ")}`);
  }

  const { messages, sections, ...rest } = update;
  const next: PipelineState = {
    ...state,
    ...rest,
    sections: sections ? { ...state.sections, ...sections } : state.sections,
    messages: messages ? [...state.messages, ...messages] : state.messages
  };

  const parsed = PipelineStateSchema.safeParse(next);
  if (!parsed.success) {
    throw new InputError(`${stage} produced an invalid state update: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function hasRun(state: PipelineState, stage: StageName): boolean {
  return state.stageHistory.some((h) => h.stage === stage);
}

export function orderedSections(state: PipelineState): SectionState[] {
  return Object.values(state.sections).sort((a, b) => a.number - b.number);
}

export function statePath(runDir: string): string {
  return path.join(runDir, "state.json");
}

export async function saveState(runDir: string, state: PipelineState): Promise<void> {
  await writeJsonFile(statePath(runDir), state);
}

export async function loadState(runDir: string): Promise<PipelineState> {
  try {
    return await readJsonFile(statePath(runDir), PipelineStateSchema);
  } catch (err) {
    throw new InputError(`No resumable state at ${statePath(runDir)}`, { cause: err });
  }
}
