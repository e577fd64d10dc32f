import { MaxTurnsExceededError, ModelBehaviorError, Runner, setDefaultOpenAIKey } from "@openai/agents";
import { loadConfig } from "../config.js";
import { InputError } from "../errors.js";

export type RunnerBundle = {
  runner: Runner;
  deterministicRunner: Runner;
  repairRunner: Runner;
};

/**
 * One agent call. `invoke` runs the agent on the given runner and returns its final output;
 * `parse` validates that output against the agent's schema.
 */
export type StructuredCall<T> = {
  label: string;
  prompt: string;
  invoke: (runner: Runner, prompt: string) => Promise<unknown>;
  parse: (value: unknown) => T;
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function assistantTextFromItem(item: unknown): string | null {
  if (!isRecord(item) || item.role !== "assistant") return null;
  const content = item.content;
  if (!Array.isArray(content)) return null;

  const parts: string[] = [];
  for (const c of content) {
    if (!isRecord(c)) continue;
    if (c.type === "output_text" && typeof c.text === "string") parts.push(c.text);
    if (c.type === "refusal" && typeof c.refusal === "string") parts.push(c.refusal);
  }

  const text = parts.join("").trim();
  return text.length > 0 ? text : null;
}

export function lastAssistantTextFromAgentsError(err: unknown): string | null {
  if (!isRecord(err)) return null;
  const state = err.state;
  if (!isRecord(state) || !Array.isArray(state._modelResponses)) return null;

  const responses: unknown[] = state._modelResponses;
  for (let i = responses.length - 1; i >= 0; i--) {
    const response = responses[i];
    const out = isRecord(response) ? response.output : undefined;
    if (!Array.isArray(out)) continue;
    for (let j = out.length - 1; j >= 0; j--) {
      const text = assistantTextFromItem(out[j]);
      if (text) return text;
    }
  }
  return null;
}

export function configureOpenAIKey(): void {
  const key = loadConfig().openaiKey;
  if (!key) throw new InputError("Missing required env var: OPENAI_API_KEY");
  setDefaultOpenAIKey(key);
}

export function createStructuredRunners(): RunnerBundle {
  return {
    runner: new Runner(),
    deterministicRunner: new Runner({ modelSettings: { temperature: 0 } }),
    repairRunner: new Runner({ modelSettings: { temperature: 0, toolChoice: "none" } })
  };
}

/**
 * Runs an agent with structured output. A schema failure gets one repair attempt from the
 * model's own bad output, then one deterministic retry from scratch.
 */
export async function runStructuredAgentOutput<T>(
  call: StructuredCall<T>,
  bundle: RunnerBundle,
  log: (message: string) => void
): Promise<T> {
  const execute = async (runner: Runner, prompt: string, suffix: string): Promise<T> => {
    const out = await call.invoke(runner, prompt);
    if (out === undefined || out === null) throw new Error(`${call.label} produced no final output${suffix}`);
    return call.parse(out);
  };

  try {
    return await execute(bundle.runner, call.prompt, "");
  } catch (err) {
    const isSchemaFailure = err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError;
    if (!isSchemaFailure) throw err;

    log(`Schema validation failed for "${call.label}". Attempting repair...`);
    const badOutput = lastAssistantTextFromAgentsError(err);

    if (badOutput) {
      const repairPrompt =
        `Your previous response failed JSON/schema validation for the required output schema.\n` +
        `Repair it so it conforms exactly.\n\n` +
        `Rules:\n` +
        `- Return ONLY JSON (no markdown fences)\n` +
        `- Do not add extra top-level keys\n` +
        `- Prefer minimal edits to preserve meaning\n\n` +
        `PREVIOUS OUTPUT:\n` +
        badOutput;

      try {
        const repaired = await execute(bundle.repairRunner, repairPrompt, " (repair)");
        log(`Schema repair succeeded for "${call.label}".`);
        return repaired;
      } catch (repairErr) {
        const msg = repairErr instanceof Error ? repairErr.message : String(repairErr);
        log(`Schema repair failed (${msg}). Retrying once from scratch...`);
      }
    } else {
      log("Schema validation failed, but raw output could not be extracted. Retrying once from scratch...");
    }

    const retried = await execute(bundle.deterministicRunner, call.prompt, " (retry)");
    log(`Schema retry succeeded for "${call.label}".`);
    return retried;
  }
}
