import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { InputError } from "../src/errors.js";
import { executeRun } from "../src/executor.js";
import { createFakeCollaborators } from "../src/pipeline/fake_collaborators.js";
import { buildInitialState, runMemoPipeline } from "../src/pipeline/memo_pipeline.js";
import { initialState, saveState } from "../src/pipeline/state.js";
import { runDirAbs } from "../src/pipeline/utils.js";
import { RunManager, type RunSettings } from "../src/run_manager.js";

const settings: RunSettings = { investmentType: "direct", mode: "consider" };

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "memo-out-"));
  process.env.MEMO_OUTPUT_DIR = tmpOut;
});

afterEach(async () => {
  vi.unstubAllEnvs();
  delete process.env.MEMO_OUTPUT_DIR;
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = null;
});

describe("memo pipeline", () => {
  it("runs a fake-mode memo to a finalized draft and reports progress", async () => {
    vi.stubEnv("MEMO_PIPELINE_MODE", "fake");
    const runs = new RunManager();
    const run = await runs.createRun("Acme Robotics", settings);

    const result = await executeRun(runs, runMemoPipeline, run, { signal: new AbortController().signal });

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.state.outcome).toBe("finalized");
    const status = runs.getRun(run.runId);
    expect(status?.status).toBe("done");
    expect(status?.traceId).toBe("trace_fake_acme-robotics-v0.0.1");
    expect(status?.steps.research).toMatchObject({ status: "done", artifacts: ["1-research.json", "1-research.md"] });
    expect(status?.steps.deck_analyst?.status).toBe("skipped");
    expect(status?.steps.finalize).toMatchObject({ status: "done", artifacts: ["4-final-draft.md", "4-citations.json"] });
    expect(status?.steps.escalate_to_human?.status).toBe("queued");

    const dir = runDirAbs("acme-robotics", "v0.0.1");
    const sections = await fs.readdir(path.join(dir, "2-sections"));
    expect(sections).toHaveLength(10);
    const draft = await fs.readFile(path.join(dir, "4-final-draft.md"), "utf8");
    expect(draft.startsWith("# Acme Robotics Investment Memo\n\n*Version v0.0.1 | Mode: Consider*")).toBe(true);
  });

  it("escalates when validation keeps failing and marks the run", async () => {
    vi.stubEnv("MEMO_MAX_REVISIONS", "1");
    const runs = new RunManager();
    const run = await runs.createRun("Acme Robotics", settings);
    const signal = new AbortController().signal;

    const result = await executeRun(runs, runMemoPipeline, run, {
      signal,
      collaborators: createFakeCollaborators({ signal, validationScores: [5] })
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.state.outcome).toBe("escalated");
      expect(result.state.revisionCount).toBe(1);
    }
    expect(runs.getRun(run.runId)?.status).toBe("escalated");
    expect(runs.getRun(run.runId)?.steps.revise?.runs).toBe(1);
  });

  it("refuses to resume from another version's state", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("Acme Robotics", settings);
    const dir = runDirAbs(run.companySlug, run.version);
    await saveState(dir, initialState({ companyName: "Acme Robotics", investmentType: "direct", mode: "consider", version: "v0.0.9" }));

    const result = await executeRun(runs, runMemoPipeline, run, { signal: new AbortController().signal, resume: true });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toEqual(new InputError(`state.json in ${dir} belongs to v0.0.9, not v0.0.1`));
    expect(runs.getRun(run.runId)?.status).toBe("error");
  });

  it("needs an API key in openai mode", async () => {
    vi.stubEnv("MEMO_PIPELINE_MODE", "openai");
    vi.stubEnv("OPENAI_API_KEY", "");
    const runs = new RunManager();
    const run = await runs.createRun("Acme Robotics", settings);

    const result = await executeRun(runs, runMemoPipeline, run, { signal: new AbortController().signal });
    expect(result).toMatchObject({ ok: false, cancelled: false });
    if (!result.ok) expect(result.error).toBeInstanceOf(InputError);
  });

  it("builds initial state from run settings", async () => {
    const state = await buildInitialState("Acme Robotics", "v0.0.1", {
      investmentType: "fund",
      mode: "justify",
      trademarkDark: "https://cdn.example.com/acme-dark.png",
      companyUrl: "https://acme.example"
    });
    expect(state.outlineName).toBe("fund");
    expect(state.trademark).toEqual({ light: null, dark: "https://cdn.example.com/acme-dark.png" });
    expect(state.companyUrl).toBe("https://acme.example");

    await expect(buildInitialState("Acme Robotics", "v0.0.1", { ...settings, scorecardName: "missing" })).rejects.toBeInstanceOf(InputError);
  });
});
