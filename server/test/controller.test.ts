import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CancelledError, StageFailedError } from "../src/errors.js";
import type { MemoCollaborators } from "../src/pipeline/collaborators.js";
import { runController, type StageContext } from "../src/pipeline/controller.js";
import { createFakeCollaborators } from "../src/pipeline/fake_collaborators.js";
import { loadOutline } from "../src/pipeline/outline.js";
import { createStageSet } from "../src/pipeline/stages/index.js";
import { initialState, loadState, type PipelineState, type StageName } from "../src/pipeline/state.js";

let runDir: string;

beforeEach(async () => {
  runDir = await fs.mkdtemp(path.join(os.tmpdir(), "memo-run-"));
});

afterEach(async () => {
  await fs.rm(runDir, { recursive: true, force: true });
});

async function context(signal: AbortSignal = new AbortController().signal): Promise<StageContext> {
  return { runId: "acme-v0.0.1", runDir, registry: await loadOutline("direct"), signal, orphanPolicy: "flag", log: () => undefined };
}

function base(): PipelineState {
  return initialState({ companyName: "Acme Robotics", investmentType: "direct", mode: "consider", version: "v0.0.1" });
}

function historyOf(state: PipelineState): Array<[StageName, string]> {
  return state.stageHistory.map((h) => [h.stage, h.status]);
}

describe("stage controller", () => {
  it("runs a passing memo to finalize and persists state after each stage", async () => {
    const saved: number[] = [];
    const collaborators = createFakeCollaborators({ signal: new AbortController().signal });
    const final = await runController({
      state: base(),
      stages: createStageSet(collaborators),
      ctx: await context(),
      policy: { maxRevisions: 3 },
      hooks: { onStateSaved: (s) => void saved.push(s.stageHistory.length) }
    });

    expect(final.outcome).toBe("finalized");
    expect(historyOf(final)).toEqual([
      ["research", "done"],
      ["write", "done"],
      ["enrich_socials", "done"],
      ["enrich_links", "done"],
      ["enrich_tables", "done"],
      ["citation_enrichment", "done"],
      ["revise_summaries", "done"],
      ["clean_sources", "done"],
      ["fact_check", "done"],
      ["validate", "done"],
      ["finalize", "done"]
    ]);
    expect(saved).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    expect(final.factCheck?.overallScore).toBe(1);
    expect(final.sourceCleanup).toEqual({ urlsChecked: 20, citationsRemoved: 0, removed: [] });
    expect(await loadState(runDir)).toEqual(final);
  });

  it("reports skipped linear stages once", async () => {
    const skipped: StageName[] = [];
    await runController({
      state: base(),
      stages: createStageSet(createFakeCollaborators({ signal: new AbortController().signal })),
      ctx: await context(),
      policy: { maxRevisions: 3 },
      hooks: { onStageSkipped: (s) => void skipped.push(s) }
    });
    expect(skipped).toEqual(["deck_analyst", "enrich_trademark", "scorecard"]);
  });

  it("records a non-critical failure and keeps going", async () => {
    const fake = createFakeCollaborators({ signal: new AbortController().signal });
    const collaborators: MemoCollaborators = {
      ...fake,
      enrichLinks: async () => {
        throw new Error("link checker offline");
      }
    };
    const finished: Array<[StageName, boolean]> = [];
    const final = await runController({
      state: base(),
      stages: createStageSet(collaborators),
      ctx: await context(),
      policy: { maxRevisions: 3 },
      hooks: { onStageFinished: (s, ok) => void finished.push([s, ok]) }
    });

    expect(final.outcome).toBe("finalized");
    expect(historyOf(final)).toContainEqual(["enrich_links", "failed"]);
    expect(final.messages).toContain("enrich_links failed (skipped): link checker offline");
    expect(finished).toContainEqual(["enrich_links", false]);
  });

  it("leaves no edits on disk from an optional stage that fails part way", async () => {
    const fake = createFakeCollaborators({ signal: new AbortController().signal });
    const collaborators: MemoCollaborators = {
      ...fake,
      enrichLinks: async (input) => {
        if (input.section.number === 2) throw new Error("link checker offline");
        return input.section.content.replace("Annual recurring revenue reached", "Annual recurring revenue (see link) reached");
      }
    };
    const final = await runController({ state: base(), stages: createStageSet(collaborators), ctx: await context(), policy: { maxRevisions: 3 } });

    expect(historyOf(final)).toContainEqual(["enrich_links", "failed"]);
    expect(final.sections["01-executive-summary.md"].content).not.toContain("(see link)");
    const onDisk = await fs.readFile(path.join(runDir, "2-sections", "01-executive-summary.md"), "utf8");
    expect(onDisk).toBe(final.sections["01-executive-summary.md"].content);
    const draft = await fs.readFile(path.join(runDir, "4-final-draft.md"), "utf8");
    expect(draft).not.toContain("(see link)");
  });

  it("keeps going when several optional stages fail in one run", async () => {
    const fake = createFakeCollaborators({ signal: new AbortController().signal });
    const collaborators: MemoCollaborators = {
      ...fake,
      findSocials: async () => {
        throw new Error("profile search unavailable");
      },
      enrichLinks: async () => {
        throw new Error("link checker offline");
      },
      enrichCitations: async () => {
        throw new Error("search quota exhausted");
      }
    };
    const final = await runController({ state: base(), stages: createStageSet(collaborators), ctx: await context(), policy: { maxRevisions: 3 } });

    expect(final.outcome).toBe("finalized");
    expect(historyOf(final)).toEqual([
      ["research", "done"],
      ["write", "done"],
      ["enrich_socials", "failed"],
      ["enrich_links", "failed"],
      ["enrich_tables", "done"],
      ["citation_enrichment", "failed"],
      ["revise_summaries", "done"],
      ["clean_sources", "done"],
      ["fact_check", "done"],
      ["validate", "done"],
      ["finalize", "done"]
    ]);
    expect(final.messages.filter((m) => m.includes("failed (skipped)"))).toEqual([
      "enrich_socials failed (skipped): profile search unavailable",
      "enrich_links failed (skipped): link checker offline",
      "citation_enrichment failed (skipped): search quota exhausted"
    ]);
    expect(final.socials).toBeNull();
    expect(final.citationEnrichment).toBeNull();
  });

  it("escalates a run whose writer produced no sections without throwing", async () => {
    const fake = createFakeCollaborators({ signal: new AbortController().signal });
    const collaborators: MemoCollaborators = { ...fake, writeSection: async () => "" };
    const final = await runController({ state: base(), stages: createStageSet(collaborators), ctx: await context(), policy: { maxRevisions: 1 } });

    expect(final.outcome).toBe("escalated");
    expect(final.sections).toEqual({});
    expect(historyOf(final).map(([s]) => s)).toEqual(["research", "write", "enrich_socials", "validate", "revise", "validate", "escalate_to_human"]);
    expect(final.messages).toContain("write: writer produced zero sections");
    expect(final.messages[final.messages.length - 1]).toBe("Memo requires human review after 1 revision(s). Score: 0.0/10\n- The memo has no sections.");
    expect(await fs.readFile(path.join(runDir, "4-final-draft.md"), "utf8")).toBe("# Acme Robotics Investment Memo\n\n*Version v0.0.1 | Mode: Consider*\n");
  });

  it("sends a section with an unsupported claim back for revision", async () => {
    const fake = createFakeCollaborators({ signal: new AbortController().signal });
    const collaborators: MemoCollaborators = {
      ...fake,
      writeSection: async (input) => {
        const content = await fake.writeSection(input);
        if (input.section.number !== 7) return content;
        return content.replace("reached $4.2M.[^2]", "reached $4.2M.[^2] The company raised a $9M seed round.");
      }
    };
    const final = await runController({ state: base(), stages: createStageSet(collaborators), ctx: await context(), policy: { maxRevisions: 3 } });

    expect(final.outcome).toBe("finalized");
    expect(final.revisionCount).toBe(1);
    expect(historyOf(final).slice(-5).map(([s]) => s)).toEqual(["fact_check", "validate", "revise", "validate", "finalize"]);
    expect(final.factCheck?.sections.find((s) => s.filename === "07-funding-terms.md")).toEqual({
      filename: "07-funding-terms.md",
      name: "Funding & Terms",
      totalClaims: 2,
      verified: 1,
      unsourced: 0,
      suspicious: 1,
      score: 0.5,
      requiresRewrite: true,
      flagged: ["The company raised a $9M seed round."]
    });
    expect(final.sections["07-funding-terms.md"].updatedBy).toBe("revise");
    expect(final.sections["07-funding-terms.md"].content).toContain(
      "Revised to address: Funding & Terms: 1 of 2 factual claims lack a citation; Funding & Terms: claim not supported by research: The company raised a $9M seed round.."
    );
    expect(final.sections["06-team.md"].updatedBy).toBe("write");
    await expect(fs.stat(path.join(runDir, "3-fact-check.json"))).resolves.toBeTruthy();
  });

  it("stops on a critical failure without recording it, then resumes from the checkpoint", async () => {
    const fake = createFakeCollaborators({ signal: new AbortController().signal });
    const failing: MemoCollaborators = {
      ...fake,
      writeSection: async (input) => {
        if (input.section.number === 3) throw new Error("model timeout");
        return await fake.writeSection(input);
      }
    };

    const first = runController({ state: base(), stages: createStageSet(failing), ctx: await context(), policy: { maxRevisions: 3 } });
    await expect(first).rejects.toBeInstanceOf(StageFailedError);
    await expect(first).rejects.toThrow("write failed: model timeout");

    const stored = await loadState(runDir);
    expect(historyOf(stored)).toEqual([["research", "done"]]);
    expect(stored.messages).toEqual(["write failed: model timeout"]);

    const written: number[] = [];
    let researchCalls = 0;
    const counting: MemoCollaborators = {
      ...fake,
      research: async (input) => {
        researchCalls += 1;
        return await fake.research(input);
      },
      writeSection: async (input) => {
        written.push(input.section.number);
        return await fake.writeSection(input);
      }
    };
    const resumed = await runController({ state: stored, stages: createStageSet(counting), ctx: await context(), policy: { maxRevisions: 3 } });

    expect(resumed.outcome).toBe("finalized");
    expect(researchCalls).toBe(0);
    expect(written).toEqual([3, 4, 5, 6, 7, 8, 9, 10]);
    expect(Object.keys(resumed.sections)).toHaveLength(10);
  });

  it("escalates after maxRevisions failing validations", async () => {
    const collaborators = createFakeCollaborators({ signal: new AbortController().signal, validationScores: [5] });
    const final = await runController({ state: base(), stages: createStageSet(collaborators), ctx: await context(), policy: { maxRevisions: 2 } });

    expect(final.outcome).toBe("escalated");
    expect(final.revisionCount).toBe(2);
    expect(historyOf(final).slice(-6).map(([s]) => s)).toEqual(["validate", "revise", "validate", "revise", "validate", "escalate_to_human"]);
    expect(final.messages[final.messages.length - 1]).toBe(
      "Memo requires human review after 2 revision(s). Score: 5.0/10\n- Executive Summary: needs more specific metrics"
    );
    await expect(fs.readFile(path.join(runDir, "4-final-draft.md"), "utf8")).resolves.toContain("# Acme Robotics Investment Memo");
  });

  it("finalizes once a revision brings the score up", async () => {
    const collaborators = createFakeCollaborators({ signal: new AbortController().signal, validationScores: [6, 9] });
    const final = await runController({ state: base(), stages: createStageSet(collaborators), ctx: await context(), policy: { maxRevisions: 3 } });

    expect(final.outcome).toBe("finalized");
    expect(final.revisionCount).toBe(1);
    expect(final.validation?.revision).toBe(1);
    expect(final.sections["01-executive-summary.md"].content).toContain("Revised to address: Executive Summary: needs more specific metrics.");
    expect(final.sections["01-executive-summary.md"].updatedBy).toBe("revise");
    expect(final.sections["02-business-overview.md"].updatedBy).toBe("write");
  });

  it("returns immediately for a state that already has an outcome", async () => {
    const done = { ...base(), outcome: "finalized" as const };
    const final = await runController({
      state: done,
      stages: createStageSet(createFakeCollaborators({ signal: new AbortController().signal })),
      ctx: await context(),
      policy: { maxRevisions: 3 }
    });
    expect(final.stageHistory).toEqual([]);
  });

  it("throws CancelledError when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      runController({
        state: base(),
        stages: createStageSet(createFakeCollaborators({ signal: controller.signal })),
        ctx: await context(controller.signal),
        policy: { maxRevisions: 3 }
      })
    ).rejects.toBeInstanceOf(CancelledError);
  });
});
