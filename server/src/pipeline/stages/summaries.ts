import type { StageDefinition } from "../controller.js";
import { orderedSections, type SectionState } from "../state.js";
import { brief, citationsPreserved, throwIfAborted, toReview, withContent, type StageDeps } from "./common.js";
import { memoForReview } from "./validate.js";

/**
 * Rewrites the opening and closing sections once every other section is final, so the
 * summary and the recommendation describe the memo that was actually written.
 */
export function reviseSummariesStage(deps: StageDeps): StageDefinition {
  return {
    name: "revise_summaries",
    reads: ["sections"],
    writes: ["sections"],
    async run(state, ctx) {
      const ordered = orderedSections(state);
      const bookends = [...new Set([ordered[0], ordered[ordered.length - 1]])].filter((s): s is SectionState => s !== undefined);
      const memo = memoForReview(state);
      const sections: Record<string, SectionState> = {};
      const messages: string[] = [];

      for (const section of bookends) {
        throwIfAborted(ctx);
        const candidate = await deps.collaborators.reviseSummary({ ...brief(state), section: toReview(section), memo });
        if (candidate.trimEnd() === section.content.trimEnd()) continue;
        if (!citationsPreserved(section.content, candidate, false)) {
          messages.push(`revise_summaries: kept original ${section.filename} (rewrite altered existing citations)`);
          continue;
        }
        sections[section.filename] = withContent(section, candidate, "revise_summaries");
      }

      ctx.log(`Summary revision changed ${Object.keys(sections).length} of ${bookends.length} sections`);
      return { sections, messages };
    }
  };
}
