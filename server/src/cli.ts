#!/usr/bin/env node
import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z } from "zod";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

// Dynamic imports so `.env` is loaded before any module reads process.env at import time.
const { loadConfig } = await import("./config.js");
const { InputError, NotFoundError, StageFailedError, exitCodeFor, toErrorMessage } = await import("./errors.js");
const { RunManager, RunSettingsSchema } = await import("./run_manager.js");
const { executeRun } = await import("./executor.js");
const { runMemoPipeline } = await import("./pipeline/memo_pipeline.js");
const { assembleStoredRun, describeIssue } = await import("./pipeline/assembly.js");
const { inspectDeck } = await import("./pipeline/deck.js");
const { defaultOutlineName, loadOutline } = await import("./pipeline/outline.js");
const { loadState } = await import("./pipeline/state.js");
const { runDirAbs, slug } = await import("./pipeline/utils.js");
const { loadLedger, resolveVersion } = await import("./pipeline/versioning.js");
const { configureOpenAIKey } = await import("./pipeline/agent_runner.js");
const { loadCorrectionsFile } = await import("./corrections/config.js");
const { runCorrections } = await import("./corrections/engine.js");
const { createMatcher } = await import("./corrections/matcher.js");
const { createRewriter } = await import("./corrections/rewriter.js");

const EventPayloadSchema = z.object({
  step: z.string().optional(),
  message: z.string().optional(),
  ok: z.boolean().optional(),
  name: z.string().optional()
});

function printMessages(messages: string[]): void {
  if (messages.length === 0) return;
  console.log("\nMessages:");
  for (const m of messages) console.log(`  - ${m}`);
}

async function runCommand(fn: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await fn();
  } catch (err) {
    console.error(`Error: ${toErrorMessage(err)}`);
    if (err instanceof StageFailedError) printMessages(err.messages);
    process.exitCode = exitCodeFor(err);
  }
}

type GenerateArgs = {
  company: string;
  type?: "direct" | "fund";
  mode: "consider" | "justify";
  deck?: string;
  outline?: string;
  scorecard?: string;
  url?: string;
  description?: string;
  stage?: string;
  notes?: string;
  trademarkLight?: string;
  trademarkDark?: string;
  resume: boolean;
  version?: string;
};

async function generate(args: GenerateArgs): Promise<number> {
  const runs = new RunManager();
  const companySlug = slug(args.company);

  let run;
  if (args.resume) {
    const version = await resolveVersion(companySlug, args.version);
    run = await runs.loadRun(companySlug, version);
    if (!run) throw new NotFoundError(`No run metadata for ${companySlug} ${version}`);
  } else {
    const parsed = RunSettingsSchema.safeParse({
      investmentType: args.type,
      mode: args.mode,
      deckPath: args.deck,
      outlineName: args.outline,
      scorecardName: args.scorecard,
      companyUrl: args.url,
      description: args.description,
      stage: args.stage,
      notes: args.notes,
      trademarkLight: args.trademarkLight,
      trademarkDark: args.trademarkDark
    });
    if (!parsed.success) throw new InputError(`Invalid options: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    if (parsed.data.deckPath) await inspectDeck(parsed.data.deckPath);
    await loadOutline(parsed.data.outlineName ?? defaultOutlineName(parsed.data.investmentType));
    run = await runs.createRun(args.company, parsed.data);
  }

  console.log(`${args.resume ? "Resuming" : "Generating"} ${run.companyName} ${run.version} (${run.runId})`);
  runs.subscribe(run.runId, (type, payload) => {
    const p = EventPayloadSchema.safeParse(payload);
    if (!p.success) return;
    const { step, message, ok } = p.data;
    if (type === "step_started") console.log(`▶ ${step}`);
    else if (type === "step_finished") console.log(`${ok ? "✓" : "✗"} ${step}`);
    else if (type === "step_skipped") console.log(`- ${step} (skipped)`);
    else if (type === "log" && message) console.log(`  ${message}`);
  });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const result = await executeRun(runs, runMemoPipeline, run, { signal: controller.signal, resume: args.resume });
  const runDir = runDirAbs(run.companySlug, run.version);

  if (result.ok) {
    const { state } = result;
    console.log(`\n${state.outcome === "escalated" ? "Escalated for human review" : "Finalized"}: ${path.join(runDir, state.finalDraft?.path ?? "")}`);
    printMessages(state.messages);
    return 0;
  }

  console.error(`\nRun failed: ${result.cancelled ? "Cancelled" : toErrorMessage(result.error)}`);
  const saved = await loadState(runDir).catch(() => null);
  printMessages(saved?.messages ?? []);
  if (result.cancelled) return 1;
  return exitCodeFor(result.error);
}

async function assemble(args: { company: string; version?: string }): Promise<number> {
  const companySlug = slug(args.company);
  const version = await resolveVersion(companySlug, args.version);
  const runDir = runDirAbs(companySlug, version);
  const result = await assembleStoredRun(runDir, loadConfig().orphanPolicy);
  console.log(`Assembled ${result.path}`);
  console.log(`  sections: ${result.sectionCount}, citations: ${result.citationCount}, words: ${result.wordCount}`);
  printMessages(result.issues.map(describeIssue));
  return 0;
}

type CorrectArgs = {
  file: string;
  preview: boolean;
  outputMode?: "new_version" | "in_place";
  sourceVersion?: string;
  matcher?: "exact" | "numeric" | "llm";
  rewriter: "literal" | "llm";
};

async function correct(args: CorrectArgs): Promise<number> {
  const file = await loadCorrectionsFile(args.file);
  const config = loadConfig();
  const matcherKind = args.matcher ?? config.matcher;
  if (matcherKind === "llm" || args.rewriter === "llm") configureOpenAIKey();

  const runs = new RunManager();
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  const llm = { signal: controller.signal, log: (message: string) => console.log(`  ${message}`) };

  const report = await runCorrections(file, {
    matcher: createMatcher(matcherKind, llm),
    rewriter: createRewriter(args.rewriter, llm),
    preview: args.preview,
    outputMode: args.outputMode,
    sourceVersion: args.sourceVersion,
    orphanPolicy: config.orphanPolicy,
    log: llm.log,
    onVersionCreated: async (companySlug, sourceVersion, targetVersion) => {
      const source = await runs.loadRun(companySlug, sourceVersion);
      if (source) await runs.registerDerived(source, targetVersion);
    }
  });

  console.log(`${report.preview ? "Preview of" : "Corrections for"} ${report.companySlug} ${report.sourceVersion}`);
  for (const c of report.corrections) {
    console.log(`\n"${c.instruction.incorrect}" -> "${c.instruction.correct}"`);
    console.log(`  forms: ${c.analysis.forms.join(" | ")}`);
    if (c.analysis.sectionHints.length > 0) console.log(`  hinted sections: ${c.analysis.sectionHints.map((h) => h.name).join(", ")}`);
    for (const hit of c.located.hits) {
      console.log(`  ${hit.filename}: ${hit.instanceCount} instance(s)`);
      for (const sample of hit.samples) console.log(`    ${sample}`);
    }
  }

  console.log(`\nSections ${report.preview ? "affected" : "modified"}: ${report.sectionsModified}`);
  console.log(`Instances ${report.preview ? "found" : "corrected"}: ${report.instancesCorrected}`);
  if (report.modifiedFiles.length > 0) console.log(`Files: ${report.modifiedFiles.join(", ")}`);
  if (report.targetVersion) console.log(`Output: ${report.targetVersion} (${report.outputMode})`);
  if (report.warnings.length > 0) {
    console.log("\nWarnings:");
    for (const w of report.warnings) console.log(`  - ${w}`);
  }
  return 0;
}

async function versions(args: { company: string }): Promise<number> {
  const companySlug = slug(args.company);
  const ledger = await loadLedger(companySlug);
  if (!ledger) throw new NotFoundError(`No memo versions found for "${companySlug}"`);
  console.log(`${companySlug} (latest ${ledger.latest})`);
  for (const entry of ledger.history) {
    const from = entry.derivedFrom ? ` from ${entry.derivedFrom}` : "";
    console.log(`  ${entry.version}  ${entry.createdAt}  ${entry.source}${from}${entry.version === ledger.latest ? "  (latest)" : ""}`);
  }
  return 0;
}

await yargs(hideBin(process.argv))
  .scriptName("memo")
  .command(
    "generate <company>",
    "Generate (or resume) an investment memo",
    (y) =>
      y
        .positional("company", { type: "string", demandOption: true, describe: "Company name" })
        .option("type", { choices: ["direct", "fund"] as const, describe: "Investment type (not needed with --resume)" })
        .option("mode", { choices: ["consider", "justify"] as const, default: "consider" as const, describe: "Memo mode" })
        .option("deck", { type: "string", describe: "Pitch deck (.pdf, .md or .txt)" })
        .option("outline", { type: "string", describe: "Outline name or YAML path" })
        .option("scorecard", { type: "string", describe: "Scorecard template name or YAML path" })
        .option("url", { type: "string", describe: "Company website" })
        .option("description", { type: "string" })
        .option("stage", { type: "string", describe: "Company stage, e.g. Seed" })
        .option("notes", { type: "string", describe: "Analyst notes for research" })
        .option("trademark-light", { type: "string", describe: "Logo for light backgrounds" })
        .option("trademark-dark", { type: "string", describe: "Logo for dark backgrounds" })
        .option("resume", { type: "boolean", default: false, describe: "Resume from state.json" })
        .option("version", { type: "string", describe: "Version to resume (default: latest)" })
        .check((argv) => argv.resume || argv.type !== undefined || "--type is required unless --resume is given"),
    (argv) =>
      runCommand(() =>
        generate({
          company: argv.company,
          type: argv.type,
          mode: argv.mode,
          deck: argv.deck,
          outline: argv.outline,
          scorecard: argv.scorecard,
          url: argv.url,
          description: argv.description,
          stage: argv.stage,
          notes: argv.notes,
          trademarkLight: argv.trademarkLight,
          trademarkDark: argv.trademarkDark,
          resume: argv.resume,
          version: argv.version
        })
      )
  )
  .command(
    "assemble <company>",
    "Reassemble the final draft from section files",
    (y) =>
      y
        .positional("company", { type: "string", demandOption: true })
        .option("version", { type: "string", describe: "Version (default: latest)" }),
    (argv) => runCommand(() => assemble({ company: argv.company, version: argv.version }))
  )
  .command(
    "correct <file>",
    "Apply a corrections YAML file",
    (y) =>
      y
        .positional("file", { type: "string", demandOption: true })
        .option("preview", { type: "boolean", default: false, describe: "Show what would change without writing" })
        .option("output-mode", { choices: ["new_version", "in_place"] as const, describe: "Override the file's output_mode" })
        .option("source-version", { type: "string", describe: "Override the file's source_version" })
        .option("matcher", { choices: ["exact", "numeric", "llm"] as const, describe: "Variant matcher" })
        .option("rewriter", { choices: ["literal", "llm"] as const, default: "literal" as const, describe: "Section rewriter" }),
    (argv) =>
      runCommand(() =>
        correct({
          file: argv.file,
          preview: argv.preview,
          outputMode: argv.outputMode,
          sourceVersion: argv.sourceVersion,
          matcher: argv.matcher,
          rewriter: argv.rewriter
        })
      )
  )
  .command(
    "versions <company>",
    "List memo versions for a company",
    (y) => y.positional("company", { type: "string", demandOption: true }),
    (argv) => runCommand(() => versions({ company: argv.company }))
  )
  .demandCommand(1)
  .strict()
  .fail((msg, err) => {
    console.error(msg || toErrorMessage(err));
    process.exitCode = 2;
  })
  .help()
  .parseAsync();
