import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { createRunLogger } from "./logger.js";
import { ARTIFACTS } from "./pipeline/artifacts.js";
import { STAGES, StageNameSchema, type StageName } from "./pipeline/state.js";
import { allocateVersion } from "./pipeline/versioning.js";
import {
  ensureDir,
  nowIso,
  outputRootAbs,
  runDirAbs,
  runIdFor,
  slug,
  tryReadJsonFile,
  writeJsonFile
} from "./pipeline/utils.js";

export const STEP_ORDER = STAGES;
export type StepName = StageName;

export const RunSettingsSchema = z
  .object({
    investmentType: z.enum(["direct", "fund"]),
    mode: z.enum(["consider", "justify"]),
    deckPath: z.string().trim().min(1).optional(),
    outlineName: z.string().trim().min(1).optional(),
    scorecardName: z.string().trim().min(1).optional(),
    companyUrl: z.string().trim().url().optional(),
    description: z.string().trim().min(1).max(2000).optional(),
    stage: z.string().trim().min(1).max(100).optional(),
    notes: z.string().trim().min(1).max(20000).optional(),
    trademarkLight: z.string().trim().min(1).optional(),
    trademarkDark: z.string().trim().min(1).optional()
  })
  .strict();

export type RunSettings = z.infer<typeof RunSettingsSchema>;

const StepRecordSchema = z.object({
  name: StageNameSchema,
  status: z.enum(["queued", "running", "done", "skipped", "error"]),
  runs: z.number().int().nonnegative(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  error: z.string().optional(),
  artifacts: z.array(z.string())
});

export const RunStatusSchema = z.object({
  runId: z.string(),
  companyName: z.string(),
  companySlug: z.string(),
  version: z.string(),
  settings: RunSettingsSchema,
  derivedFrom: z.object({ version: z.string(), reason: z.enum(["correction"]), createdAt: z.string() }).optional(),
  status: z.enum(["queued", "running", "done", "escalated", "error"]),
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  traceId: z.string().optional(),
  steps: z.record(StageNameSchema, StepRecordSchema),
  outputFolder: z.string()
});

export type StepRecord = z.infer<typeof StepRecordSchema>;
export type RunStatus = z.infer<typeof RunStatusSchema>;
export type RunDerivedFrom = NonNullable<RunStatus["derivedFrom"]>;

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "companyName" | "version" | "status" | "startedAt" | "finishedAt">;

export type RunEventType = "step_started" | "step_finished" | "step_skipped" | "artifact_written" | "log" | "error";

const EVENT_TYPES: readonly RunEventType[] = ["step_started", "step_finished", "step_skipped", "artifact_written", "log", "error"];

function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "escalated" || status === "error";
}

function freshSteps(): RunStatus["steps"] {
  const steps: RunStatus["steps"] = {};
  for (const name of STEP_ORDER) steps[name] = { name, status: "queued", runs: 0, artifacts: [] };
  return steps;
}

function newEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // Node treats "error" events specially: if nobody is listening, it throws.
  emitter.on("error", () => undefined);
  return emitter;
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const steps: RunStatus["steps"] = {};
  for (const name of STEP_ORDER) {
    const step = run.steps[name];
    if (!step) continue;
    steps[name] =
      step.status === "running"
        ? { ...step, status: "error", error: step.error ?? "Recovered after server restart while run was active.", finishedAt: step.finishedAt ?? recoveredAt }
        : step;
  }
  return { ...run, status: "error", finishedAt: run.finishedAt ?? recoveredAt, steps };
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const companies = await fs.readdir(outputRootAbs(), { withFileTypes: true }).catch(() => []);
    for (const company of companies) {
      if (!company.isDirectory()) continue;
      const versions = await fs.readdir(path.join(outputRootAbs(), company.name), { withFileTypes: true }).catch(() => []);
      for (const v of versions) {
        if (v.isDirectory()) await this.loadRun(company.name, v.name);
      }
    }
  }

  /**
   * Registers a run whose folder already exists on disk (restart, or a corrected copy).
   */
  async loadRun(companySlug: string, version: string): Promise<RunStatus | null> {
    const runJsonPath = path.join(runDirAbs(companySlug, version), ARTIFACTS.run);
    const data = await tryReadJsonFile(runJsonPath, RunStatusSchema);
    if (!data) return null;
    const recovered = recoverStaleLoadedRun(data);
    if (recovered !== data) {
      await writeJsonFile(runJsonPath, recovered).catch(() => undefined);
    }
    const existing = this.runs.get(recovered.runId);
    this.runs.set(recovered.runId, { ...recovered, emitter: existing?.emitter ?? newEmitter() });
    return recovered;
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({
        runId: r.runId,
        companyName: r.companyName,
        version: r.version,
        status: r.status,
        startedAt: r.startedAt,
        finishedAt: r.finishedAt
      }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  getInternal(runId: string): RunInternal | null {
    return this.runs.get(runId) ?? null;
  }

  runDir(runId: string): string | null {
    const r = this.runs.get(runId);
    return r ? runDirAbs(r.companySlug, r.version) : null;
  }

  async createRun(companyName: string, settings: RunSettings): Promise<RunStatus> {
    const companySlug = slug(companyName);
    const version = await allocateVersion(companySlug, "generate");
    return await this.register(companyName, companySlug, version, settings);
  }

  /**
   * Records run metadata for a version folder that was produced by copying another version.
   */
  async registerDerived(source: RunStatus, version: string): Promise<RunStatus> {
    const derivedFrom: RunDerivedFrom = { version: source.version, reason: "correction", createdAt: nowIso() };
    const run = await this.register(source.companyName, source.companySlug, version, source.settings, derivedFrom);
    const r = this.runs.get(run.runId);
    if (!r) return run;
    r.status = source.status === "running" || source.status === "queued" ? "error" : source.status;
    r.finishedAt = nowIso();
    r.steps = structuredClone(source.steps);
    await this.persist(r);
    return this.snapshot(r);
  }

  private async register(
    companyName: string,
    companySlug: string,
    version: string,
    settings: RunSettings,
    derivedFrom?: RunDerivedFrom
  ): Promise<RunStatus> {
    const runId = runIdFor(companySlug, version);
    const run: RunInternal = {
      runId,
      companyName,
      companySlug,
      version,
      settings,
      derivedFrom,
      status: "queued",
      startedAt: nowIso(),
      steps: freshSteps(),
      outputFolder: path.join("output", companySlug, version),
      emitter: this.runs.get(runId)?.emitter ?? newEmitter()
    };

    await ensureDir(runDirAbs(companySlug, version));
    this.runs.set(runId, run);
    await this.persist(run);
    return this.snapshot(run);
  }

  async setRunStatus(runId: string, status: RunStatus["status"], patch?: Partial<Pick<RunStatus, "finishedAt" | "traceId">>): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (status === "running") delete r.finishedAt;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    if (patch?.traceId) r.traceId = patch.traceId;
    await this.persist(r);
  }

  async setTraceId(runId: string, traceId: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.traceId = traceId;
    await this.persist(r);
  }

  private step(r: RunInternal, name: StepName): StepRecord {
    const existing = r.steps[name];
    if (existing) return existing;
    const created: StepRecord = { name, status: "queued", runs: 0, artifacts: [] };
    r.steps[name] = created;
    return created;
  }

  async startStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = this.step(r, step);
    s.status = "running";
    s.runs += 1;
    s.startedAt = nowIso();
    delete s.finishedAt;
    delete s.error;
    await this.persist(r);
    r.emitter.emit("step_started", { step, at: s.startedAt });
    createRunLogger(runId).info({ step }, "step started");
  }

  async finishStep(runId: string, step: StepName, ok: boolean, error?: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = this.step(r, step);
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (!ok && error) s.error = error;
    await this.persist(r);
    r.emitter.emit("step_finished", { step, at: s.finishedAt, ok });
    if (!ok && error) {
      r.emitter.emit("error", { step, message: error, at: s.finishedAt });
      createRunLogger(runId).warn({ step, err: error }, "step failed");
    }
  }

  async skipStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = this.step(r, step);
    if (s.status === "done") return;
    s.status = "skipped";
    await this.persist(r);
    r.emitter.emit("step_skipped", { step, at: nowIso() });
  }

  async addArtifact(runId: string, step: StepName, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = this.step(r, step);
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { step, name, at: nowIso() });
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
    createRunLogger(runId).info({ step }, message);
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
    createRunLogger(runId).error({ step }, message);
  }

  subscribe(runId: string, onEvent: (type: RunEventType, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      r.emitter.on(type, handler);
      return [type, handler] as const;
    });

    return () => {
      for (const [type, handler] of handlers) r.emitter.off(type, handler);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return structuredClone(pub);
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runDirAbs(run.companySlug, run.version), ARTIFACTS.run), this.snapshot(run));
  }
}
