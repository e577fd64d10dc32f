import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { RunManager, RunStatusSchema, STEP_ORDER, type RunSettings } from "../src/run_manager.js";
import { runDirAbs } from "../src/pipeline/utils.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "memo-out-"));
  process.env.MEMO_OUTPUT_DIR = tmpOut;
});

afterEach(async () => {
  delete process.env.MEMO_OUTPUT_DIR;
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = null;
});

const settings: RunSettings = { investmentType: "direct", mode: "consider" };

async function readRunJson(companySlug: string, version: string) {
  const raw = await fs.readFile(path.join(runDirAbs(companySlug, version), "run.json"), "utf8");
  return RunStatusSchema.parse(JSON.parse(raw));
}

describe("RunManager", () => {
  it("createRun allocates a version, writes run.json and initializes steps", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("Acme Robotics", settings);

    expect(run.runId).toBe("acme-robotics-v0.0.1");
    expect(run.companySlug).toBe("acme-robotics");
    expect(run.version).toBe("v0.0.1");
    expect(run.status).toBe("queued");
    expect(run.outputFolder).toBe(path.join("output", "acme-robotics", "v0.0.1"));

    const onDisk = await readRunJson("acme-robotics", "v0.0.1");
    expect(onDisk.runId).toBe(run.runId);
    for (const s of STEP_ORDER) {
      expect(onDisk.steps[s]).toEqual({ name: s, status: "queued", runs: 0, artifacts: [] });
    }

    const second = await runs.createRun("Acme Robotics", settings);
    expect(second.runId).toBe("acme-robotics-v0.0.2");
    expect(runs.runDir(second.runId)).toBe(runDirAbs("acme-robotics", "v0.0.2"));
  });

  it("emits step and artifact events to subscribers", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("Acme Robotics", settings);

    const events: string[] = [];
    const unsub = runs.subscribe(run.runId, (type) => {
      events.push(type);
    });
    expect(unsub).toBeTypeOf("function");

    await runs.startStep(run.runId, "research");
    await runs.addArtifact(run.runId, "research", "1-research.json");
    await runs.finishStep(run.runId, "research", true);
    await runs.startStep(run.runId, "write");
    await runs.finishStep(run.runId, "write", false, "model timeout");
    await runs.skipStep(run.runId, "scorecard");
    unsub?.();
    runs.log(run.runId, "after unsubscribe");

    expect(events).toEqual(["step_started", "artifact_written", "step_finished", "step_started", "step_finished", "error", "step_skipped"]);
    const snapshot = runs.getRun(run.runId);
    expect(snapshot?.steps.research).toMatchObject({ status: "done", runs: 1, artifacts: ["1-research.json"] });
    expect(snapshot?.steps.write).toMatchObject({ status: "error", error: "model timeout" });
    expect(snapshot?.steps.scorecard?.status).toBe("skipped");
  });

  it("error events never crash the process when unobserved", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("Acme Robotics", settings);
    expect(() => runs.error(run.runId, "boom")).not.toThrow();
    expect(runs.subscribe("missing-v0.0.1", () => undefined)).toBeNull();
  });

  it("initFromDisk loads prior runs and skips folders without a valid run.json", async () => {
    const runs1 = new RunManager();
    const r1 = await runs1.createRun("Acme Robotics", settings);

    const root = tmpOut ?? "";
    await fs.writeFile(path.join(root, "not_a_dir.txt"), "x\n", "utf8");
    await fs.mkdir(path.join(root, "globex", "v0.0.1"), { recursive: true });
    await fs.mkdir(path.join(root, "initech", "v0.0.1"), { recursive: true });
    await fs.writeFile(path.join(root, "initech", "v0.0.1", "run.json"), "{not json", "utf8");

    const runs2 = new RunManager();
    await runs2.initFromDisk();

    expect(runs2.getRun(r1.runId)?.companyName).toBe("Acme Robotics");
    expect(runs2.getRun("globex-v0.0.1")).toBeNull();
    expect(runs2.getRun("initech-v0.0.1")).toBeNull();
    expect(runs2.listRuns()).toHaveLength(1);
  });

  it("marks runs that were active at shutdown as failed", async () => {
    const runs1 = new RunManager();
    const run = await runs1.createRun("Acme Robotics", settings);
    await runs1.setRunStatus(run.runId, "running");
    await runs1.startStep(run.runId, "write");

    const runs2 = new RunManager();
    await runs2.initFromDisk();
    const loaded = runs2.getRun(run.runId);

    expect(loaded?.status).toBe("error");
    expect(loaded?.finishedAt).toBeTypeOf("string");
    expect(loaded?.steps.write).toMatchObject({ status: "error", error: "Recovered after server restart while run was active." });
    expect((await readRunJson("acme-robotics", "v0.0.1")).status).toBe("error");
  });

  it("registerDerived records a corrected copy with its source's steps", async () => {
    const runs = new RunManager();
    const source = await runs.createRun("Acme Robotics", settings);
    await runs.startStep(source.runId, "research");
    await runs.finishStep(source.runId, "research", true);
    await runs.setRunStatus(source.runId, "escalated");
    const stored = runs.getRun(source.runId);
    if (!stored) throw new Error("missing source run");

    const derived = await runs.registerDerived(stored, "v0.0.2");

    expect(derived.runId).toBe("acme-robotics-v0.0.2");
    expect(derived.status).toBe("escalated");
    expect(derived.derivedFrom).toMatchObject({ version: "v0.0.1", reason: "correction" });
    expect(derived.steps.research?.status).toBe("done");
    expect((await readRunJson("acme-robotics", "v0.0.2")).derivedFrom?.version).toBe("v0.0.1");
  });

  it("listRuns sorts newest first", async () => {
    const runs = new RunManager();
    const r1 = await runs.createRun("Acme Robotics", settings);
    const r2 = await runs.createRun("Globex", settings);

    const i1 = runs.getInternal(r1.runId);
    const i2 = runs.getInternal(r2.runId);
    if (!i1 || !i2) throw new Error("missing internal run");

    i1.startedAt = "2020-01-01T00:00:00.000Z";
    i2.startedAt = "2020-01-02T00:00:00.000Z";
    expect(runs.listRuns().map((r) => r.runId)).toEqual(["globex-v0.0.1", "acme-robotics-v0.0.1"]);

    i1.startedAt = "2020-01-03T00:00:00.000Z";
    expect(runs.listRuns()[0]?.runId).toBe("acme-robotics-v0.0.1");
  });
});
