import path from "node:path";
import { ARTIFACTS } from "../artifacts.js";
import { splitCitationBlock } from "../citations.js";
import type { StageDefinition } from "../controller.js";
import { extractClaims, summarizeSection, type CheckedClaim } from "../fact_check.js";
import { orderedSections, type FactCheck, type SectionFactCheck } from "../state.js";
import { writeJsonFile } from "../utils.js";
import { brief, throwIfAborted, toReview, type StageDeps } from "./common.js";

/**
 * Checks each section's factual claims. Cited claims count as verified; uncited ones go
 * to the fact checker, which says whether the research backs them.
 */
export function factCheckStage(deps: StageDeps): StageDefinition {
  return {
    name: "fact_check",
    reads: ["sections", "research", "revisionCount"],
    writes: ["factCheck"],
    async run(state, ctx) {
      const summaries: SectionFactCheck[] = [];
      const details: Array<{ filename: string; claims: CheckedClaim[] }> = [];

      for (const section of orderedSections(state)) {
        throwIfAborted(ctx);
        const claims = extractClaims(splitCitationBlock(section.content).body);
        const uncited = claims.filter((c) => !c.cited);

        const verdicts = new Map<number, { verdict: "unsourced" | "suspicious"; reasoning: string }>();
        if (uncited.length > 0) {
          const out = await deps.collaborators.factCheck({
            ...brief(state),
            section: toReview(section),
            claims: uncited.map((c) => c.text),
            research: state.research
          });
          for (const v of out.verdicts) verdicts.set(v.claim_index, { verdict: v.verdict, reasoning: v.reasoning });
        }

        let uncitedIndex = 0;
        const checked = claims.map((claim): CheckedClaim => {
          if (claim.cited) return { ...claim, verdict: "verified", reasoning: "Cited in the memo." };
          const v = verdicts.get(uncitedIndex);
          uncitedIndex += 1;
          return { ...claim, verdict: v?.verdict ?? "suspicious", reasoning: v?.reasoning ?? "No verdict was returned for this claim." };
        });

        summaries.push(summarizeSection(section.filename, section.name, checked));
        details.push({ filename: section.filename, claims: checked });
      }

      const total = summaries.reduce((n, s) => n + s.totalClaims, 0);
      const verified = summaries.reduce((n, s) => n + s.verified, 0);
      const factCheck: FactCheck = {
        revision: state.revisionCount,
        overallScore: total === 0 ? 1 : Number((verified / total).toFixed(2)),
        sections: summaries
      };

      await writeJsonFile(path.join(ctx.runDir, ARTIFACTS.factCheckJson), { ...factCheck, claims: details });
      const flagged = summaries.filter((s) => s.requiresRewrite).map((s) => s.name);
      ctx.log(`Fact check: ${verified}/${total} claims cited${flagged.length > 0 ? `; needs rewrite: ${flagged.join(", ")}` : ""}`);
      return { factCheck };
    }
  };
}
