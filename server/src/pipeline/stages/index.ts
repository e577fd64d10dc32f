import type { MemoCollaborators } from "../collaborators.js";
import type { StageSet } from "../controller.js";
import { deckAnalystStage } from "./deck_analyst.js";
import { factCheckStage } from "./fact_check.js";
import {
  citationEnrichmentStage,
  enrichLinksStage,
  enrichSocialsStage,
  enrichTablesStage,
  enrichTrademarkStage
} from "./enrichment.js";
import { researchStage } from "./research.js";
import { reviseStage } from "./revise.js";
import { scorecardStage } from "./scorecard.js";
import { cleanSourcesStage } from "./sources.js";
import { reviseSummariesStage } from "./summaries.js";
import { escalateStage, finalizeStage } from "./terminal.js";
import { validateStage } from "./validate.js";
import { writeStage } from "./write.js";

export function createStageSet(collaborators: MemoCollaborators): StageSet {
  const deps = { collaborators };
  return {
    deck_analyst: deckAnalystStage(deps),
    research: researchStage(deps),
    write: writeStage(deps),
    enrich_trademark: enrichTrademarkStage(),
    enrich_socials: enrichSocialsStage(deps),
    enrich_links: enrichLinksStage(deps),
    enrich_tables: enrichTablesStage(),
    scorecard: scorecardStage(deps),
    citation_enrichment: citationEnrichmentStage(deps),
    revise_summaries: reviseSummariesStage(deps),
    clean_sources: cleanSourcesStage(deps),
    fact_check: factCheckStage(deps),
    validate: validateStage(deps),
    revise: reviseStage(deps),
    finalize: finalizeStage(),
    escalate_to_human: escalateStage()
  };
}
