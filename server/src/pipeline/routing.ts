import { hasRun, LINEAR_STAGES, type PipelineState, type StageName } from "./state.js";

export const DONE = "DONE" as const;
export type Route = StageName | typeof DONE;

export type RoutingPolicy = {
  maxRevisions: number;
};

type LinearStage = (typeof LINEAR_STAGES)[number];

function knownCompanyUrl(state: PipelineState): string | null {
  return state.companyUrl ?? state.research?.companyUrl ?? null;
}

const PRECONDITIONS: Record<LinearStage, (state: PipelineState) => boolean> = {
  deck_analyst: (s) => s.deck !== null,
  research: () => true,
  write: () => true,
  enrich_trademark: (s) => s.trademark !== null && (s.trademark.light !== null || s.trademark.dark !== null),
  enrich_socials: (s) => knownCompanyUrl(s) !== null,
  enrich_links: (s) => Object.keys(s.sections).length > 0,
  enrich_tables: (s) => Object.keys(s.sections).length > 0 && (s.research?.metrics.length ?? 0) > 0,
  scorecard: (s) => s.scorecardName !== null,
  citation_enrichment: (s) => Object.keys(s.sections).length > 0,
  revise_summaries: (s) => Object.keys(s.sections).length > 0,
  clean_sources: (s) => Object.keys(s.sections).length > 0,
  fact_check: (s) => Object.keys(s.sections).length > 0
};

/**
 * Pure routing: the same state and policy always yield the same next stage.
 */
export function nextStage(state: PipelineState, policy: RoutingPolicy): Route {
  if (state.outcome !== null) return DONE;

  for (const stage of LINEAR_STAGES) {
    if (hasRun(state, stage)) continue;
    if (!PRECONDITIONS[stage](state)) continue;
    return stage;
  }

  const validation = state.validation;
  if (validation === null || validation.revision < state.revisionCount) return "validate";

  if (validation.needsRevision) {
    return state.revisionCount < policy.maxRevisions ? "revise" : "escalate_to_human";
  }
  return "finalize";
}

/**
 * Linear stages that routing will pass over for this state, for step bookkeeping.
 */
export function skippedLinearStages(state: PipelineState): LinearStage[] {
  return LINEAR_STAGES.filter((stage) => !hasRun(state, stage) && !PRECONDITIONS[stage](state));
}
