import { StageCheckpoint } from "../checkpoint.js";
import type { StageDefinition } from "../controller.js";
import { orderedSections, type SectionState } from "../state.js";
import { brief, citationsPreserved, throwIfAborted, toReview, withContent, type StageDeps } from "./common.js";

/**
 * Sections an issue names; when no issue names a section, every section is revised.
 */
export function sectionsToRevise(sections: SectionState[], issues: string[]): SectionState[] {
  const lowered = issues.map((i) => i.toLowerCase());
  const named = sections.filter((s) => lowered.some((i) => i.includes(s.name.toLowerCase())));
  return named.length > 0 ? named : sections;
}

export function reviseStage(deps: StageDeps): StageDefinition {
  return {
    name: "revise",
    reads: ["validation", "sections", "revisionCount"],
    writes: ["sections", "revisionCount"],
    async run(state, ctx) {
      const round = state.revisionCount + 1;
      const issues = state.validation?.issues ?? [];
      const suggestions = state.validation?.suggestions ?? [];
      const checkpoint = await StageCheckpoint.open(ctx.runDir, `revise-${round}`);
      const sections: Record<string, SectionState> = {};
      const messages: string[] = [];

      for (const section of sectionsToRevise(orderedSections(state), issues)) {
        throwIfAborted(ctx);
        let content = checkpoint.get(section.filename);
        if (content === null) {
          const lowerName = section.name.toLowerCase();
          const relevant = issues.filter((i) => i.toLowerCase().includes(lowerName));
          content = await deps.collaborators.reviseSection({
            ...brief(state),
            section: toReview(section),
            issues: relevant.length > 0 ? relevant : issues,
            suggestions
          });
          await checkpoint.complete(section.filename, content);
        }
        if (!citationsPreserved(section.content, content, true)) {
          messages.push(`revise: ${section.filename} revision dropped existing citations`);
        }
        sections[section.filename] = withContent(section, content, "revise", "edited");
      }

      ctx.log(`Revision ${round}: revised ${Object.keys(sections).length} sections`);
      return { sections, messages, revisionCount: round };
    }
  };
}
