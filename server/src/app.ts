import express from "express";
import type { Response } from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import archiver from "archiver";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { parseCorrections } from "./corrections/config.js";
import { runCorrections } from "./corrections/engine.js";
import { createMatcher } from "./corrections/matcher.js";
import { createRewriter } from "./corrections/rewriter.js";
import { CitationIntegrityError, InputError, NotFoundError, toErrorMessage } from "./errors.js";
import type { RunExecutor } from "./executor.js";
import logger from "./logger.js";
import { configureOpenAIKey } from "./pipeline/agent_runner.js";
import { assembleStoredRun, describeIssue } from "./pipeline/assembly.js";
import { inspectDeck } from "./pipeline/deck.js";
import { defaultOutlineName, loadOutline } from "./pipeline/outline.js";
import { statePath } from "./pipeline/state.js";
import { fileExists, isSafeArtifactName, listFilesRecursive, parseRunId, runIdFor, slug } from "./pipeline/utils.js";
import { RunSettingsSchema, type RunManager } from "./run_manager.js";

const CreateRunBodySchema = z
  .object({
    companyName: z.string().trim().min(1).max(200),
    settings: RunSettingsSchema
  })
  .strict();

const CorrectionBodySchema = z
  .object({
    yaml: z.string().min(1),
    outputMode: z.enum(["new_version", "in_place"]).optional(),
    sourceVersion: z.string().trim().min(1).optional(),
    matcher: z.enum(["exact", "numeric", "llm"]).optional(),
    rewriter: z.enum(["literal", "llm"]).optional()
  })
  .strict();

function sendError(res: Response, err: unknown): void {
  const message = toErrorMessage(err);
  if (err instanceof NotFoundError) res.status(404).json({ error: message });
  else if (err instanceof InputError) res.status(400).json({ error: message });
  else if (err instanceof CitationIntegrityError) res.status(422).json({ error: message, problems: err.problems });
  else {
    logger.error({ err }, "request failed");
    res.status(500).json({ error: message });
  }
}

function contentTypeFor(name: string): string {
  const lower = name.toLowerCase();
  if (lower.endsWith(".json")) return "application/json; charset=utf-8";
  if (lower.endsWith(".md")) return "text/markdown; charset=utf-8";
  return "text/plain; charset=utf-8";
}

export function createApp(runs: RunManager, executor: RunExecutor) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.get("/api/health", (_req, res) => {
    const config = loadConfig();
    res.json({
      ok: true,
      hasKey: Boolean(config.openaiKey),
      pipelineMode: config.pipelineMode,
      model: config.model,
      maxRevisions: config.maxRevisions
    });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { companyName, settings } = parsed.data;
    try {
      if (settings.deckPath) await inspectDeck(settings.deckPath);
      await loadOutline(settings.outlineName ?? defaultOutlineName(settings.investmentType));
      const run = await runs.createRun(companyName, settings);
      res.json({ runId: run.runId, version: run.version });
      executor.enqueue(run.runId);
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/cancel", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.post("/api/runs/:runId/resume", async (req, res) => {
    const runId = req.params.runId;
    const dir = runs.runDir(runId);
    if (!dir) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    if (executor.isRunning(runId) || executor.isQueued(runId)) {
      res.status(409).json({ error: "run is already queued or running" });
      return;
    }
    if (!(await fileExists(statePath(dir)))) {
      res.status(400).json({ error: "run has no state.json to resume from" });
      return;
    }

    executor.enqueue(runId, { resume: true });
    res.json({ ok: true, runId });
  });

  app.post("/api/runs/:runId/assemble", async (req, res) => {
    const runId = req.params.runId;
    const dir = runs.runDir(runId);
    if (!dir) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    if (executor.isRunning(runId)) {
      res.status(409).json({ error: "run is currently running; cancel it first" });
      return;
    }

    try {
      const result = await assembleStoredRun(dir, loadConfig().orphanPolicy);
      res.json({
        path: path.relative(dir, result.path),
        sectionCount: result.sectionCount,
        citationCount: result.citationCount,
        wordCount: result.wordCount,
        issues: result.issues.map(describeIssue)
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getInternal(runId);
    if (!run) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const dir = runs.runDir(runId);
    if (!dir) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="memo-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(dir, false);
    archive.finalize().catch((err: unknown) => runs.error(runId, `zip error: ${toErrorMessage(err)}`));
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const dir = runs.runDir(req.params.runId);
    if (!dir) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const infos: Array<{ name: string; size: number; mtimeMs: number }> = [];
    for (const name of await listFilesRecursive(dir)) {
      const st = await fs.stat(path.join(dir, name)).catch(() => null);
      if (st) infos.push({ name, size: st.size, mtimeMs: st.mtimeMs });
    }
    res.json(infos);
  });

  const sendArtifact = async (res: Response, runId: string, name: string) => {
    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    const dir = runs.runDir(runId);
    if (!dir) {
      res.status(404).send("run not found");
      return;
    }

    try {
      const data = await fs.readFile(path.join(dir, name));
      res.setHeader("Content-Type", contentTypeFor(name));
      res.send(data);
    } catch {
      res.status(404).send("artifact not found");
    }
  };

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    await sendArtifact(res, req.params.runId, req.params.name);
  });

  app.get("/api/runs/:runId/artifacts/:dir/:name", async (req, res) => {
    await sendArtifact(res, req.params.runId, `${req.params.dir}/${req.params.name}`);
  });

  const correctionHandler = (preview: boolean) => async (req: express.Request, res: Response) => {
    const parsed = CorrectionBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const file = parseCorrections(parsed.data.yaml);
      if (!preview) {
        const companySlug = slug(file.companyName);
        const busy = runs
          .listRuns()
          .some((r) => parseRunId(r.runId)?.companySlug === companySlug && (executor.isRunning(r.runId) || executor.isQueued(r.runId)));
        if (busy) {
          res.status(409).json({ error: `a run for ${file.companyName} is queued or running; wait for it to finish` });
          return;
        }
      }
      const config = loadConfig();
      const matcherKind = parsed.data.matcher ?? config.matcher;
      const rewriterKind = parsed.data.rewriter ?? "literal";
      if (matcherKind === "llm" || rewriterKind === "llm") configureOpenAIKey();

      const controller = new AbortController();
      req.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });
      const llm = { signal: controller.signal, log: (message: string) => logger.info({ scope: "corrections" }, message) };

      const report = await runCorrections(file, {
        matcher: createMatcher(matcherKind, llm),
        rewriter: createRewriter(rewriterKind, llm),
        preview,
        outputMode: parsed.data.outputMode,
        sourceVersion: parsed.data.sourceVersion,
        orphanPolicy: config.orphanPolicy,
        log: llm.log,
        onVersionCreated: async (companySlug, sourceVersion, targetVersion) => {
          const source = runs.getRun(runIdFor(companySlug, sourceVersion));
          if (source) await runs.registerDerived(source, targetVersion);
          else await runs.loadRun(companySlug, targetVersion);
        }
      });
      res.json(report);
    } catch (err) {
      sendError(res, err);
    }
  };

  app.post("/api/corrections/preview", correctionHandler(true));
  app.post("/api/corrections/apply", correctionHandler(false));

  return app;
}
