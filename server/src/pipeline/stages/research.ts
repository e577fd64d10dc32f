import { ARTIFACTS, renderResearchMarkdown, writeJsonAndMarkdown } from "../artifacts.js";
import type { StageDefinition } from "../controller.js";
import type { Research } from "../state.js";
import { brief, type StageDeps } from "./common.js";

export function researchStage(deps: StageDeps): StageDefinition {
  return {
    name: "research",
    reads: ["companyName", "companyUrl", "companyDescription", "companyStage", "researchNotes", "deckAnalysis"],
    writes: ["research"],
    async run(state, ctx) {
      const out = await deps.collaborators.research({
        ...brief(state),
        companyUrl: state.companyUrl,
        description: state.companyDescription,
        stage: state.companyStage,
        notes: state.researchNotes,
        deckFacts: state.deckAnalysis?.keyFacts ?? []
      });

      const inRange = (i: number) => i >= 0 && i < out.sources.length;
      const research: Research = {
        summary: out.summary,
        companyUrl: out.company_url,
        findings: out.findings.map((f) => ({ topic: f.topic, detail: f.detail, sourceIndexes: f.source_indexes.filter(inRange) })),
        metrics: out.metrics.map((m) => ({
          label: m.label,
          value: m.value,
          sourceIndex: m.source_index !== null && inRange(m.source_index) ? m.source_index : null
        })),
        sources: out.sources
      };

      await writeJsonAndMarkdown(
        ctx.runDir,
        ARTIFACTS.researchJson,
        research,
        ARTIFACTS.researchMd,
        renderResearchMarkdown(state.companyName, research)
      );
      ctx.log(`Research: ${research.findings.length} findings, ${research.sources.length} sources`);
      return { research };
    }
  };
}
