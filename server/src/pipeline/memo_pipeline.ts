import path from "node:path";
import { withTrace } from "@openai/agents";
import { loadConfig } from "../config.js";
import { InputError } from "../errors.js";
import type { PipelineFn, PipelineInput } from "../executor.js";
import type { RunSettings } from "../run_manager.js";
import { configureOpenAIKey } from "./agent_runner.js";
import { ARTIFACTS } from "./artifacts.js";
import type { MemoCollaborators } from "./collaborators.js";
import { runController, type StageContext } from "./controller.js";
import { inspectDeck } from "./deck.js";
import { createFakeCollaborators } from "./fake_collaborators.js";
import { createOpenAICollaborators } from "./openai_collaborators.js";
import { defaultOutlineName, loadOutline } from "./outline.js";
import { loadScorecard } from "./scorecard.js";
import { createStageSet } from "./stages/index.js";
import { fileExists, runDirAbs } from "./utils.js";
import { initialState, loadState, type PipelineState, type StageName } from "./state.js";

const STAGE_ARTIFACTS: Partial<Record<StageName, string[]>> = {
  deck_analyst: [ARTIFACTS.deckAnalysisJson, ARTIFACTS.deckAnalysisMd],
  research: [ARTIFACTS.researchJson, ARTIFACTS.researchMd],
  scorecard: [ARTIFACTS.scorecardJson, ARTIFACTS.scorecardMd],
  clean_sources: [ARTIFACTS.sourceCheckJson],
  fact_check: [ARTIFACTS.factCheckJson],
  validate: [ARTIFACTS.validationJson, ARTIFACTS.validationMd],
  finalize: [ARTIFACTS.finalDraft, ARTIFACTS.citationsJson],
  escalate_to_human: [ARTIFACTS.finalDraft, ARTIFACTS.citationsJson]
};

export async function buildInitialState(companyName: string, version: string, settings: RunSettings): Promise<PipelineState> {
  const deck = settings.deckPath ? await inspectDeck(settings.deckPath) : null;
  if (settings.scorecardName) await loadScorecard(settings.scorecardName);
  const trademark =
    settings.trademarkLight || settings.trademarkDark
      ? { light: settings.trademarkLight ?? null, dark: settings.trademarkDark ?? null }
      : null;

  return initialState({
    companyName,
    investmentType: settings.investmentType,
    mode: settings.mode,
    version,
    deck,
    outlineName: settings.outlineName ?? defaultOutlineName(settings.investmentType),
    scorecardName: settings.scorecardName ?? null,
    companyUrl: settings.companyUrl ?? null,
    companyDescription: settings.description ?? null,
    companyStage: settings.stage ?? null,
    researchNotes: settings.notes ?? null,
    trademark
  });
}

async function startingState(input: PipelineInput, runDir: string, resume: boolean): Promise<PipelineState> {
  if (resume) {
    const loaded = await loadState(runDir);
    if (loaded.version !== input.version) {
      throw new InputError(`state.json in ${runDir} belongs to ${loaded.version}, not ${input.version}`);
    }
    return loaded;
  }
  return await buildInitialState(input.companyName, input.version, input.settings);
}

/**
 * Runs (or resumes) one memo run through the stage controller, reporting progress to the
 * run registry. Returns the final state; `state.outcome` tells finalized from escalated.
 */
export const runMemoPipeline: PipelineFn = async (input, runs, options) => {
  const config = loadConfig();
  const { runId } = input;
  const runDir = runDirAbs(input.companySlug, input.version);
  const state = await startingState(input, runDir, options.resume ?? false);
  const registry = await loadOutline(state.outlineName);

  const log = (message: string) => runs.log(runId, message);
  const ctx: StageContext = {
    runId,
    runDir,
    registry,
    signal: options.signal,
    orphanPolicy: config.orphanPolicy,
    log
  };

  if (options.resume) log(`Resuming from state.json (${state.stageHistory.length} stages recorded)`);

  const drive = (collaborators: MemoCollaborators) =>
    runController({
      state,
      stages: createStageSet(collaborators),
      ctx,
      policy: { maxRevisions: config.maxRevisions },
      hooks: {
        onStageStarted: (stage) => runs.startStep(runId, stage),
        onStageSkipped: (stage) => runs.skipStep(runId, stage),
        onStageFinished: async (stage, ok, error) => {
          await runs.finishStep(runId, stage, ok, error);
          if (!ok) return;
          for (const name of STAGE_ARTIFACTS[stage] ?? []) {
            if (await fileExists(path.join(runDir, name))) await runs.addArtifact(runId, stage, name);
          }
        }
      }
    });

  if (options.collaborators) return await drive(options.collaborators);

  if (config.pipelineMode === "fake") {
    await runs.setTraceId(runId, `trace_fake_${runId}`);
    return await drive(createFakeCollaborators({ signal: options.signal, delayMs: config.fakeStepDelayMs }));
  }

  configureOpenAIKey();

  return await withTrace(`MemoPipeline:${runId}`, async (trace) => {
    await runs.setTraceId(runId, trace.traceId);
    return await drive(createOpenAICollaborators({ signal: options.signal, log, sourceCheckTimeoutMs: config.sourceCheckTimeoutMs }));
  });
};
