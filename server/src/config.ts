import { z } from "zod";

const DEFAULT_MODEL = "gpt-5.2";

const trimmed = z
  .string()
  .transform((s) => s.trim())
  .optional()
  .transform((s) => (s && s.length > 0 ? s : undefined));

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      const n = raw === undefined || raw.trim() === "" ? fallback : Number(raw);
      return Number.isInteger(n) && n >= 0 ? n : fallback;
    });

const EnvSchema = z.object({
  OPENAI_API_KEY: trimmed,
  MEMO_MODEL: trimmed,
  MEMO_PIPELINE_MODE: z
    .string()
    .optional()
    .transform((s) => (s?.trim().toLowerCase() === "fake" ? "fake" : "openai")),
  MEMO_OUTPUT_DIR: trimmed,
  MEMO_DATA_DIR: trimmed,
  MEMO_MAX_REVISIONS: positiveInt(3),
  MEMO_MAX_CONCURRENT_RUNS: positiveInt(1),
  MEMO_CITATION_ORPHANS: z
    .string()
    .optional()
    .transform((s) => (s?.trim().toLowerCase() === "fail" ? "fail" : "flag")),
  MEMO_CORRECTION_MATCHER: z
    .string()
    .optional()
    .transform((s) => {
      const v = s?.trim().toLowerCase();
      return v === "exact" || v === "llm" ? v : "numeric";
    }),
  MEMO_FAKE_STEP_DELAY_MS: positiveInt(0),
  MEMO_SOURCE_CHECK_TIMEOUT_MS: positiveInt(10000),
  PORT: positiveInt(5050)
});

export type OrphanPolicy = "flag" | "fail";
export type MatcherKind = "exact" | "numeric" | "llm";

export type AppConfig = {
  openaiKey?: string;
  model: string;
  pipelineMode: "openai" | "fake";
  outputDir?: string;
  dataDir?: string;
  maxRevisions: number;
  maxConcurrentRuns: number;
  orphanPolicy: OrphanPolicy;
  matcher: MatcherKind;
  fakeStepDelayMs: number;
  sourceCheckTimeoutMs: number;
  port: number;
};

// Read on every call so tests (and the CLI after dotenv) see the current environment.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);
  return {
    openaiKey: e.OPENAI_API_KEY,
    model: e.MEMO_MODEL ?? DEFAULT_MODEL,
    pipelineMode: e.MEMO_PIPELINE_MODE,
    outputDir: e.MEMO_OUTPUT_DIR,
    dataDir: e.MEMO_DATA_DIR,
    maxRevisions: e.MEMO_MAX_REVISIONS,
    maxConcurrentRuns: Math.max(1, e.MEMO_MAX_CONCURRENT_RUNS),
    orphanPolicy: e.MEMO_CITATION_ORPHANS,
    matcher: e.MEMO_CORRECTION_MATCHER,
    fakeStepDelayMs: Math.min(2000, e.MEMO_FAKE_STEP_DELAY_MS),
    sourceCheckTimeoutMs: Math.max(1000, e.MEMO_SOURCE_CHECK_TIMEOUT_MS),
    port: e.PORT > 0 ? e.PORT : 5050
  };
}
