import { CancelledError, StageFailedError, toErrorMessage } from "./errors.js";
import type { MemoCollaborators } from "./pipeline/collaborators.js";
import { StageNameSchema, type PipelineState, type StageName } from "./pipeline/state.js";
import { nowIso } from "./pipeline/utils.js";
import type { RunManager, RunSettings, RunStatus } from "./run_manager.js";

export type PipelineInput = {
  runId: string;
  companyName: string;
  companySlug: string;
  version: string;
  settings: RunSettings;
};

export type PipelineOptions = {
  signal: AbortSignal;
  resume?: boolean;
  collaborators?: MemoCollaborators;
};

export type PipelineFn = (input: PipelineInput, runs: RunManager, options: PipelineOptions) => Promise<PipelineState>;

export type ExecutionResult =
  | { ok: true; state: PipelineState }
  | { ok: false; error: unknown; cancelled: boolean };

type QueueItem = {
  runId: string;
  resume: boolean;
};

/**
 * Runs one registered run to completion and records its terminal status. Shared by the
 * queue below and the CLI, which runs in the foreground.
 */
export async function executeRun(
  runs: RunManager,
  pipeline: PipelineFn,
  run: RunStatus,
  options: PipelineOptions
): Promise<ExecutionResult> {
  try {
    await runs.setRunStatus(run.runId, "running");
    if (options.signal.aborted) throw new CancelledError();
    const state = await pipeline(
      { runId: run.runId, companyName: run.companyName, companySlug: run.companySlug, version: run.version, settings: run.settings },
      runs,
      options
    );
    await runs.setRunStatus(run.runId, state.outcome === "escalated" ? "escalated" : "done", { finishedAt: nowIso() });
    return { ok: true, state };
  } catch (err) {
    const cancelled = err instanceof CancelledError || options.signal.aborted;
    const msg = cancelled ? "Cancelled" : toErrorMessage(err);
    runs.error(run.runId, msg, stageOf(err));
    await runs.setRunStatus(run.runId, "error", { finishedAt: nowIso() });
    return { ok: false, error: err, cancelled };
  }
}

function stageOf(err: unknown): StageName | undefined {
  if (!(err instanceof StageFailedError)) return undefined;
  const parsed = StageNameSchema.safeParse(err.stage);
  return parsed.success ? parsed.data : undefined;
}

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: QueueItem[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  isQueued(runId: string): boolean {
    return this.queue.some((q) => q.runId === runId);
  }

  /**
   * Returns false for unknown runs and for runs already queued or running.
   */
  enqueue(runId: string, options?: { resume?: boolean }): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (this.isQueued(runId) || this.running.has(runId)) return false;

    this.queue.push({ runId, resume: options?.resume ?? false });
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.findIndex((q) => q.runId === runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      this.runs
        .setRunStatus(runId, "error", { finishedAt: nowIso() })
        .catch((err: unknown) => this.runs.error(runId, `Failed to persist cancellation: ${toErrorMessage(err)}`));
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;
      void this.start(next);
    }
  }

  private async start(item: QueueItem): Promise<void> {
    const run = this.runs.getRun(item.runId);
    if (!run) return;

    const controller = new AbortController();
    this.running.set(item.runId, controller);

    try {
      await executeRun(this.runs, this.pipeline, run, { signal: controller.signal, resume: item.resume });
    } catch (err) {
      this.runs.error(item.runId, `Run bookkeeping failed: ${toErrorMessage(err)}`);
    } finally {
      this.running.delete(item.runId);
      this.drain();
    }
  }
}
