import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { loadConfig } = await import("./config.js");
const { default: logger } = await import("./logger.js");
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { runMemoPipeline } = await import("./pipeline/memo_pipeline.js");

const config = loadConfig();

const runs = new RunManager();
await runs.initFromDisk();

if (config.pipelineMode === "fake") {
  logger.info("server pipeline mode: fake (MEMO_PIPELINE_MODE=fake)");
}

const executor = new RunExecutor(runs, runMemoPipeline, { concurrency: config.maxConcurrentRuns });
const app = createApp(runs, executor);

app.listen(config.port, () => {
  logger.info({ port: config.port, model: config.model, maxRevisions: config.maxRevisions }, `server listening on http://localhost:${config.port}`);
});
