import path from "node:path";
import { assembleFinalDraft, describeIssue } from "../assembly.js";
import type { StageContext, StageDefinition } from "../controller.js";
import type { PipelineState, StageUpdate } from "../state.js";

async function assemble(state: PipelineState, ctx: StageContext): Promise<StageUpdate> {
  const result = await assembleFinalDraft({
    runDir: ctx.runDir,
    companyName: state.companyName,
    version: state.version,
    mode: state.mode,
    orphanPolicy: ctx.orphanPolicy
  });
  ctx.log(`Assembled ${path.basename(result.path)}: ${result.sectionCount} sections, ${result.citationCount} citations`);
  return {
    finalDraft: {
      path: path.relative(ctx.runDir, result.path),
      citationCount: result.citationCount,
      issueCount: result.issues.length,
      wordCount: result.wordCount
    },
    messages: result.issues.map((i) => `citations: ${describeIssue(i)}`)
  };
}

export function finalizeStage(): StageDefinition {
  return {
    name: "finalize",
    reads: ["sections", "validation"],
    writes: ["finalDraft", "outcome"],
    async run(state, ctx) {
      const update = await assemble(state, ctx);
      return { ...update, outcome: "finalized", messages: [...(update.messages ?? []), "Memo finalized"] };
    }
  };
}

export function escalateStage(): StageDefinition {
  return {
    name: "escalate_to_human",
    reads: ["sections", "validation", "revisionCount"],
    writes: ["finalDraft", "outcome"],
    async run(state, ctx) {
      const update = await assemble(state, ctx);
      const v = state.validation;
      const review = [
        `Memo requires human review after ${state.revisionCount} revision(s). Score: ${v ? v.overallScore.toFixed(1) : "n/a"}/10`,
        ...(v?.issues ?? []).map((i) => `- ${i}`)
      ].join("\n");
      return { ...update, outcome: "escalated", messages: [...(update.messages ?? []), review] };
    }
  };
}
