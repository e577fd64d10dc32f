import type { Runner } from "@openai/agents";
import {
  citationEnricherAgent,
  deckAnalystAgent,
  factCheckerAgent,
  linkEnricherAgent,
  researcherAgent,
  reviserAgent,
  scorecardAgent,
  sectionWriterAgent,
  socialsAgent,
  summaryReviserAgent,
  validatorAgent
} from "./agents.js";
import { createStructuredRunners, runStructuredAgentOutput, type RunnerBundle } from "./agent_runner.js";
import type { CompanyBrief, MemoCollaborators } from "./collaborators.js";
import {
  DeckAnalystOutputSchema,
  FactCheckOutputSchema,
  ResearcherOutputSchema,
  ScorecardOutputSchema,
  SectionOutputSchema,
  SocialsOutputSchema,
  ValidatorOutputSchema
} from "./schemas.js";
import { checkSourceUrl } from "./sources.js";

function briefBlock(b: CompanyBrief): string {
  return `COMPANY: ${b.companyName}\nINVESTMENT TYPE: ${b.investmentType}\nMEMO MODE: ${b.mode}`;
}

function json(label: string, value: unknown): string {
  return `${label} (JSON):\n${JSON.stringify(value, null, 2)}`;
}

export function createOpenAICollaborators(options: {
  signal: AbortSignal;
  log: (message: string) => void;
  sourceCheckTimeoutMs: number;
  bundle?: RunnerBundle;
}): MemoCollaborators {
  const { signal, log, sourceCheckTimeoutMs } = options;
  const bundle = options.bundle ?? createStructuredRunners();

  const sectionCall = (label: string, agent: typeof sectionWriterAgent, prompt: string, maxTurns: number) =>
    runStructuredAgentOutput(
      {
        label,
        prompt,
        invoke: async (runner: Runner, p: string) => (await runner.run(agent, p, { maxTurns, signal })).finalOutput,
        parse: (v) => SectionOutputSchema.parse(v)
      },
      bundle,
      log
    ).then((out) => out.content_markdown);

  return {
    async analyzeDeck(input) {
      const outline = input.sections.map((s) => ({ number: s.number, name: s.name, description: s.description }));
      const prompt = [briefBlock(input), json("OUTLINE", outline), `DECK TEXT:\n${input.deckText}`].join("\n\n");
      return await runStructuredAgentOutput(
        {
          label: deckAnalystAgent.name,
          prompt,
          invoke: async (runner, p) => (await runner.run(deckAnalystAgent, p, { maxTurns: 6, signal })).finalOutput,
          parse: (v) => DeckAnalystOutputSchema.parse(v)
        },
        bundle,
        log
      );
    },

    async research(input) {
      const prompt = [
        briefBlock(input),
        `COMPANY URL: ${input.companyUrl ?? "unknown"}`,
        `DESCRIPTION: ${input.description ?? "n/a"}`,
        `STAGE: ${input.stage ?? "n/a"}`,
        input.notes ? `ANALYST NOTES:\n${input.notes}` : "",
        input.deckFacts.length > 0 ? json("FACTS FROM DECK", input.deckFacts) : ""
      ]
        .filter((s) => s.length > 0)
        .join("\n\n");
      return await runStructuredAgentOutput(
        {
          label: researcherAgent.name,
          prompt,
          invoke: async (runner, p) => (await runner.run(researcherAgent, p, { maxTurns: 12, signal })).finalOutput,
          parse: (v) => ResearcherOutputSchema.parse(v)
        },
        bundle,
        log
      );
    },

    async writeSection(input) {
      const s = input.section;
      const modeGuidance = input.mode === "justify" ? s.modeSpecific.justify : s.modeSpecific.consider;
      const prompt = [
        briefBlock(input),
        json("SECTION", {
          number: s.number,
          name: s.name,
          description: s.description,
          guiding_questions: s.guidingQuestions,
          target_length: s.targetLength ?? null,
          vocabulary: s.vocabulary,
          mode_guidance: modeGuidance ?? null,
          validation_criteria: s.validationCriteria
        }),
        json("RESEARCH", input.research),
        input.deckDraft ? `DECK DRAFT OF THIS SECTION:\n${input.deckDraft}` : "DECK DRAFT OF THIS SECTION: none"
      ].join("\n\n");
      return await sectionCall(`${sectionWriterAgent.name} (${s.name})`, sectionWriterAgent, prompt, 6);
    },

    async enrichLinks(input) {
      const prompt = `${briefBlock(input)}\n\nSECTION:\n${input.section.content}`;
      return await sectionCall(`${linkEnricherAgent.name} (${input.section.name})`, linkEnricherAgent, prompt, 10);
    },

    async findSocials(input) {
      const prompt = `${briefBlock(input)}\nCOMPANY URL: ${input.companyUrl}`;
      return await runStructuredAgentOutput(
        {
          label: socialsAgent.name,
          prompt,
          invoke: async (runner, p) => (await runner.run(socialsAgent, p, { maxTurns: 8, signal })).finalOutput,
          parse: (v) => SocialsOutputSchema.parse(v)
        },
        bundle,
        log
      );
    },

    async scoreCard(input) {
      const prompt = [
        briefBlock(input),
        json("SCORECARD TEMPLATE", {
          scale: input.template.scale,
          dimensions: input.template.dimensions
        }),
        json("RESEARCH", input.research),
        `MEMO SECTIONS:\n${input.sections.map((s) => s.content).join("\n\n")}`
      ].join("\n\n");
      return await runStructuredAgentOutput(
        {
          label: scorecardAgent.name,
          prompt,
          invoke: async (runner, p) => (await runner.run(scorecardAgent, p, { maxTurns: 6, signal })).finalOutput,
          parse: (v) => ScorecardOutputSchema.parse(v)
        },
        bundle,
        log
      );
    },

    async enrichCitations(input) {
      const prompt = `${briefBlock(input)}\n\nSECTION:\n${input.section.content}`;
      return await sectionCall(`${citationEnricherAgent.name} (${input.section.name})`, citationEnricherAgent, prompt, 12);
    },

    async reviseSummary(input) {
      const prompt = [briefBlock(input), `FULL MEMO:\n${input.memo}`, `SECTION TO REWRITE:\n${input.section.content}`].join("\n\n");
      return await sectionCall(`${summaryReviserAgent.name} (${input.section.name})`, summaryReviserAgent, prompt, 6);
    },

    async checkSource(url) {
      return await checkSourceUrl(url, { signal, timeoutMs: sourceCheckTimeoutMs });
    },

    async factCheck(input) {
      const prompt = [
        briefBlock(input),
        `SECTION: ${input.section.name}`,
        json("RESEARCH", input.research),
        `CLAIMS:\n${input.claims.map((c, i) => `${i}. ${c}`).join("\n")}`
      ].join("\n\n");
      return await runStructuredAgentOutput(
        {
          label: `${factCheckerAgent.name} (${input.section.name})`,
          prompt,
          invoke: async (runner, p) => (await runner.run(factCheckerAgent, p, { maxTurns: 4, signal })).finalOutput,
          parse: (v) => FactCheckOutputSchema.parse(v)
        },
        bundle,
        log
      );
    },

    async validate(input) {
      const prompt = [briefBlock(input), json("EXPECTED SECTIONS", input.sectionNames), `MEMO:\n${input.memo}`].join("\n\n");
      return await runStructuredAgentOutput(
        {
          label: validatorAgent.name,
          prompt,
          invoke: async (runner, p) => (await runner.run(validatorAgent, p, { maxTurns: 6, signal })).finalOutput,
          parse: (v) => ValidatorOutputSchema.parse(v)
        },
        bundle,
        log
      );
    },

    async reviseSection(input) {
      const prompt = [
        briefBlock(input),
        json("VALIDATOR ISSUES", input.issues),
        json("VALIDATOR SUGGESTIONS", input.suggestions),
        `SECTION:\n${input.section.content}`
      ].join("\n\n");
      return await sectionCall(`${reviserAgent.name} (${input.section.name})`, reviserAgent, prompt, 6);
    }
  };
}
