import { ARTIFACTS, renderValidationMarkdown, writeJsonAndMarkdown } from "../artifacts.js";
import { titleHeader } from "../assembly.js";
import { consolidateCitations } from "../citations.js";
import type { StageDefinition } from "../controller.js";
import { factCheckIssues } from "../fact_check.js";
import { orderedSections, type PipelineState, type Validation } from "../state.js";
import { brief, type StageDeps } from "./common.js";

export const PASS_SCORE = 8;

export function emptyMemoValidation(revision: number): Validation {
  return {
    overallScore: 0,
    needsRevision: true,
    issues: ["The memo has no sections."],
    suggestions: ["Check research output and re-run the writer."],
    strengths: [],
    categoryScores: {},
    revision
  };
}

export function memoForReview(state: PipelineState): string {
  const sections = orderedSections(state);
  return consolidateCitations([
    { key: "title", number: 0, content: titleHeader(state.companyName, state.version, state.mode) },
    ...sections.map((s) => ({ key: s.filename, number: s.number, name: s.name, content: s.content.replace(/^#\s+/, "## ") }))
  ]).document;
}

/**
 * Issues from a fact check that ran against the current revision; an older check is stale.
 */
function currentFactCheckIssues(state: PipelineState): string[] {
  const check = state.factCheck;
  if (!check || check.revision !== state.revisionCount) return [];
  return check.sections.flatMap(factCheckIssues);
}

export function validateStage(deps: StageDeps): StageDefinition {
  return {
    name: "validate",
    reads: ["sections", "revisionCount", "mode", "factCheck"],
    writes: ["validation"],
    async run(state, ctx) {
      let validation: Validation;
      if (Object.keys(state.sections).length === 0) {
        validation = emptyMemoValidation(state.revisionCount);
      } else {
        const out = await deps.collaborators.validate({
          ...brief(state),
          memo: memoForReview(state),
          sectionNames: ctx.registry.all().map((s) => s.name)
        });
        const factIssues = currentFactCheckIssues(state);
        validation = {
          overallScore: out.overall_score,
          needsRevision: out.needs_revision || out.overall_score < PASS_SCORE || factIssues.length > 0,
          issues: [...out.issues, ...factIssues],
          suggestions: factIssues.length > 0 ? [...out.suggestions, "Cite or remove the claims the fact check flagged."] : out.suggestions,
          strengths: out.strengths,
          categoryScores: Object.fromEntries(out.category_scores.map((c) => [c.category, c.score])),
          revision: state.revisionCount
        };
      }

      await writeJsonAndMarkdown(ctx.runDir, ARTIFACTS.validationJson, validation, ARTIFACTS.validationMd, renderValidationMarkdown(validation));
      ctx.log(`Validation score ${validation.overallScore.toFixed(1)} (needs revision: ${validation.needsRevision ? "yes" : "no"})`);
      return { validation };
    }
  };
}
