import { CancelledError, StageFailedError, toErrorMessage } from "../errors.js";
import type { OrphanPolicy } from "../config.js";
import { writeSectionFile } from "./artifacts.js";
import type { SectionRegistry } from "./outline.js";
import { DONE, nextStage, type RoutingPolicy } from "./routing.js";
import {
  CRITICAL_STAGES,
  LINEAR_STAGES,
  mergeStageUpdate,
  hasRun,
  saveState,
  type PipelineState,
  type StageName,
  type StageUpdate,
  type WritableKey
} from "./state.js";
import { nowIso } from "./utils.js";

export type StageContext = {
  runId: string;
  runDir: string;
  registry: SectionRegistry;
  signal: AbortSignal;
  orphanPolicy: OrphanPolicy;
  log: (message: string) => void;
};

export type StageDefinition = {
  name: StageName;
  /** State keys the stage depends on; documentation for readers and checked by tests. */
  reads: readonly (keyof PipelineState)[];
  writes: readonly WritableKey[];
  run: (state: PipelineState, ctx: StageContext) => Promise<StageUpdate>;
};

export type StageSet = { [K in StageName]: StageDefinition };

export type ControllerHooks = {
  onStageStarted?: (stage: StageName) => Promise<void> | void;
  onStageFinished?: (stage: StageName, ok: boolean, error?: string) => Promise<void> | void;
  onStageSkipped?: (stage: StageName) => Promise<void> | void;
  onStateSaved?: (state: PipelineState) => Promise<void> | void;
};

function recordHistory(state: PipelineState, stage: StageName, status: "done" | "failed", error: string | null): PipelineState {
  return { ...state, stageHistory: [...state.stageHistory, { stage, status, at: nowIso(), error }] };
}

function newlySkipped(state: PipelineState, route: StageName | typeof DONE, reported: Set<StageName>): StageName[] {
  const linear: readonly StageName[] = LINEAR_STAGES;
  const idx = route === DONE ? linear.length : linear.indexOf(route);
  const upTo = idx === -1 ? linear.length : idx;
  return linear.slice(0, upTo).filter((s) => !hasRun(state, s) && !reported.has(s));
}

/**
 * Drives a run to completion: route, run the stage, merge its update, persist `state.json`.
 * Section files under `2-sections/` are written here, only for updates that merged.
 *
 * Resume is the same call with a loaded state. Non-critical stage failures are recorded and
 * the run continues; a critical failure persists the last good state and throws
 * StageFailedError without a history entry, so resuming re-runs that stage.
 */
export async function runController(args: {
  state: PipelineState;
  stages: StageSet;
  ctx: StageContext;
  policy: RoutingPolicy;
  hooks?: ControllerHooks;
}): Promise<PipelineState> {
  const { stages, ctx, policy } = args;
  const hooks = args.hooks ?? {};
  let state = args.state;
  const reportedSkips = new Set<StageName>();
  const maxIterations = LINEAR_STAGES.length + 2 * (policy.maxRevisions + 1) + 4;

  const persist = async () => {
    await saveState(ctx.runDir, state);
    await hooks.onStateSaved?.(state);
  };

  await persist();

  for (let i = 0; i < maxIterations; i++) {
    if (ctx.signal.aborted) throw new CancelledError();

    const route = nextStage(state, policy);
    for (const skipped of newlySkipped(state, route, reportedSkips)) {
      reportedSkips.add(skipped);
      await hooks.onStageSkipped?.(skipped);
    }
    if (route === DONE) return state;

    const stage = stages[route];
    await hooks.onStageStarted?.(route);
    try {
      const update = await stage.run(state, ctx);
      if (ctx.signal.aborted) throw new CancelledError();
      const merged = mergeStageUpdate(state, update, stage.writes, route);
      for (const filename of Object.keys(update.sections ?? {})) {
        await writeSectionFile(ctx.runDir, filename, merged.sections[filename].content);
      }
      state = recordHistory(merged, route, "done", null);
      await persist();
      await hooks.onStageFinished?.(route, true);
    } catch (err) {
      if (err instanceof CancelledError || ctx.signal.aborted) {
        await hooks.onStageFinished?.(route, false, "Cancelled");
        throw err instanceof CancelledError ? err : new CancelledError();
      }

      const msg = toErrorMessage(err);
      if (CRITICAL_STAGES.has(route)) {
        state = { ...state, messages: [...state.messages, `${route} failed: ${msg}`] };
        await persist();
        await hooks.onStageFinished?.(route, false, msg);
        throw new StageFailedError(route, msg, { cause: err, messages: state.messages });
      }

      ctx.log(`${route} failed (continuing): ${msg}`);
      state = recordHistory({ ...state, messages: [...state.messages, `${route} failed (skipped): ${msg}`] }, route, "failed", msg);
      await persist();
      await hooks.onStageFinished?.(route, false, msg);
    }
  }

  throw new Error(`Routing did not terminate within ${maxIterations} stages`);
}
