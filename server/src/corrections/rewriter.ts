import { sectionRewriterAgent } from "../pipeline/agents.js";
import { createStructuredRunners, runStructuredAgentOutput, type RunnerBundle } from "../pipeline/agent_runner.js";
import { inlineMarkers } from "../pipeline/citations.js";
import { SectionOutputSchema } from "../pipeline/schemas.js";
import type { CorrectionInstruction } from "./config.js";
import { replaceEditable } from "./text.js";

export type RewriteRequest = {
  companyName: string;
  section: { filename: string; name: string };
  /** Section body without its citation block. */
  body: string;
  instruction: CorrectionInstruction;
  /** The incorrect value followed by its variants. */
  forms: string[];
};

export type SectionRewriter = {
  readonly name: string;
  rewrite: (request: RewriteRequest) => Promise<string>;
};

export const literalRewriter: SectionRewriter = {
  name: "literal",
  async rewrite(req) {
    return replaceEditable(req.body, req.forms, req.instruction.correct).text;
  }
};

function sameMarkers(a: string, b: string): boolean {
  const x = inlineMarkers(a);
  const y = inlineMarkers(b);
  return x.length === y.length && x.every((id, i) => id === y[i]);
}

/**
 * Lets the model adjust figures derived from the corrected value. Output that moves, adds
 * or drops a citation marker is discarded in favour of the literal rewrite; instances the
 * model missed are replaced literally afterwards.
 */
export function llmRewriter(options: { signal: AbortSignal; log: (message: string) => void; bundle?: RunnerBundle }): SectionRewriter {
  const bundle = options.bundle ?? createStructuredRunners();
  return {
    name: "llm",
    async rewrite(req) {
      const prompt = [
        `COMPANY: ${req.companyName}`,
        `SECTION: ${req.section.name}`,
        `INCORRECT VALUE: ${req.instruction.incorrect}`,
        `ALSO WRITTEN AS: ${req.forms.slice(1).join(", ") || "none"}`,
        `CORRECT VALUE: ${req.instruction.correct}`,
        req.instruction.field ? `FIELD: ${req.instruction.field}` : "",
        `SECTION TEXT:\n${req.body}`
      ]
        .filter((s) => s.length > 0)
        .join("\n");

      const out = await runStructuredAgentOutput(
        {
          label: `${sectionRewriterAgent.name} (${req.section.name})`,
          prompt,
          invoke: async (runner, p) => (await runner.run(sectionRewriterAgent, p, { maxTurns: 3, signal: options.signal })).finalOutput,
          parse: (v) => SectionOutputSchema.parse(v)
        },
        bundle,
        options.log
      );

      const candidate = out.content_markdown.replace(/\s+$/, "");
      if (!sameMarkers(req.body, candidate)) {
        options.log(`${req.section.filename}: rewrite changed citation markers; using literal replacement`);
        return await literalRewriter.rewrite(req);
      }
      return replaceEditable(candidate, req.forms, req.instruction.correct).text;
    }
  };
}

export function createRewriter(
  kind: "literal" | "llm",
  llm?: { signal: AbortSignal; log: (message: string) => void; bundle?: RunnerBundle }
): SectionRewriter {
  if (kind === "literal") return literalRewriter;
  if (!llm) throw new Error("The llm rewriter needs an abort signal and a log sink");
  return llmRewriter(llm);
}
