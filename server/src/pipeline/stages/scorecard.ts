import { ARTIFACTS, writeJsonAndMarkdown } from "../artifacts.js";
import type { StageDefinition } from "../controller.js";
import type { SectionRegistry } from "../outline.js";
import { loadScorecard, renderScorecardMarkdown, SCORECARD_BLOCK_PREFIX, scorecardBlock } from "../scorecard.js";
import { orderedSections, type PipelineState, type SectionState } from "../state.js";
import { appendToBody, brief, toReview, withContent, type StageDeps } from "./common.js";

function scorecardTarget(state: PipelineState, registry: SectionRegistry): SectionState | null {
  const hinted = registry.forField("scorecard").map((d) => state.sections[d.filename]).find((s) => s !== undefined);
  if (hinted) return hinted;
  const ordered = orderedSections(state);
  return ordered[ordered.length - 1] ?? null;
}

export function scorecardStage(deps: StageDeps): StageDefinition {
  return {
    name: "scorecard",
    reads: ["scorecardName", "sections", "research"],
    writes: ["scorecard", "sections"],
    async run(state, ctx) {
      if (!state.scorecardName) return {};
      const template = await loadScorecard(state.scorecardName);
      if (!template.applicable_types.includes(state.investmentType)) {
        return { messages: [`scorecard: ${template.name} does not apply to ${state.investmentType} memos`] };
      }

      const out = await deps.collaborators.scoreCard({
        ...brief(state),
        template,
        sections: orderedSections(state).map(toReview),
        research: state.research
      });

      const known = new Set(template.dimensions.map((d) => d.id));
      const clamp = (n: number) => Math.min(template.scale.max, Math.max(template.scale.min, Math.round(n)));
      const scores = out.scores.filter((s) => known.has(s.dimension)).map((s) => ({ ...s, score: clamp(s.score) }));
      const overall = scores.length > 0 ? Number((scores.reduce((sum, s) => sum + s.score, 0) / scores.length).toFixed(2)) : 0;
      const scorecard = { scorecardId: template.scorecard_id, scores, overall };

      await writeJsonAndMarkdown(
        ctx.runDir,
        ARTIFACTS.scorecardJson,
        scorecard,
        ARTIFACTS.scorecardMd,
        renderScorecardMarkdown(template, scores)
      );
      ctx.log(`Scorecard ${template.scorecard_id}: overall ${overall}`);

      const target = scorecardTarget(state, ctx.registry);
      if (!target || target.content.includes(SCORECARD_BLOCK_PREFIX)) return { scorecard };
      const updated = withContent(target, appendToBody(target.content, scorecardBlock(template, scores, overall)), "scorecard");
      return { scorecard, sections: { [target.filename]: updated } };
    }
  };
}
