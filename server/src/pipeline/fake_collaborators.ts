import { parseSection, renderSection } from "./citations.js";
import type { MemoCollaborators } from "./collaborators.js";
import { slug, wait } from "./utils.js";

export type FakeCollaboratorOptions = {
  signal: AbortSignal;
  delayMs?: number;
  /** Validator scores returned call by call; the last one repeats. */
  validationScores?: number[];
};

function citation(n: number, companySlug: string, topic: string): string {
  return `[^${n}]: 2024-03-0${n}. [${topic}](https://news.example.com/${companySlug}/${slug(topic)}). Example Wire. Published: 2024-03-0${n} | Updated: N/A`;
}

/**
 * Deterministic stand-ins for every LLM call, used by `MEMO_PIPELINE_MODE=fake` and tests.
 */
export function createFakeCollaborators(options: FakeCollaboratorOptions): MemoCollaborators {
  const { signal } = options;
  const delayMs = options.delayMs ?? 0;
  const scores = options.validationScores && options.validationScores.length > 0 ? options.validationScores : [8.5];
  let validateCalls = 0;

  const tick = () => wait(delayMs, signal);

  return {
    async analyzeDeck(input) {
      await tick();
      const firstLine = input.deckText.split("\n").find((l) => l.trim().length > 0) ?? input.companyName;
      return {
        company_name: input.companyName,
        summary: `Deck for ${input.companyName}: ${firstLine.trim()}`,
        key_facts: [{ label: "Deck headline", value: firstLine.trim() }],
        data_gaps: ["Team backgrounds not disclosed in deck"],
        section_drafts: input.sections.slice(0, 2).map((s) => ({
          section_number: s.number,
          content_markdown: `The deck positions ${input.companyName} around "${firstLine.trim()}".`
        }))
      };
    },

    async research(input) {
      await tick();
      const companySlug = slug(input.companyName);
      return {
        summary: `${input.companyName} is a ${input.stage ?? "venture-stage"} company.`,
        company_url: input.companyUrl ?? `https://www.${companySlug}.example`,
        findings: [{ topic: "Funding", detail: `${input.companyName} raised a seed round.`, source_indexes: [0] }],
        metrics: [{ label: "Annual recurring revenue", value: "$4.2M", source_index: 0 }],
        sources: [
          {
            title: `${input.companyName} raises seed round`,
            url: `https://news.example.com/${companySlug}/seed`,
            publisher: "Example Wire",
            published: "2024-03-01",
            updated: null
          }
        ]
      };
    },

    async writeSection(input) {
      await tick();
      const companySlug = slug(input.companyName);
      const draft = input.deckDraft?.replace(/^#[^\n]*\n+/, "").trim();
      const lead = draft ? `${draft} ` : "";
      return [
        `# ${input.section.name}`,
        "",
        `${lead}${input.companyName} is assessed here on ${input.section.name.toLowerCase()}.[^1] Annual recurring revenue reached $4.2M.[^2]`,
        "",
        "### Citations",
        "",
        citation(1, companySlug, `${input.section.name} overview`),
        "",
        citation(2, companySlug, `${input.section.name} metrics`)
      ].join("\n");
    },

    async enrichLinks(input) {
      await tick();
      return input.section.content;
    },

    async findSocials(input) {
      await tick();
      const companySlug = slug(input.companyName);
      return {
        website: input.companyUrl,
        linkedin: `https://www.linkedin.com/company/${companySlug}`,
        twitter: null,
        crunchbase: `https://www.crunchbase.com/organization/${companySlug}`
      };
    },

    async scoreCard(input) {
      await tick();
      const scores = input.template.dimensions.map((d) => ({ dimension: d.id, score: 3, rationale: `Average evidence on ${d.name}.` }));
      return { scores, overall: 3 };
    },

    async enrichCitations(input) {
      await tick();
      return input.section.content;
    },

    async reviseSummary(input) {
      await tick();
      return input.section.content;
    },

    async checkSource(url) {
      await tick();
      return { url, status: "valid", detail: "not checked in fake mode" };
    },

    async factCheck(input) {
      await tick();
      const evidence = JSON.stringify(input.research ?? {}).replace(/,/g, "");
      const verdicts = input.claims.map((claim, index) => {
        const numbers = (claim.match(/\d[\d,.]*\d|\d/g) ?? []).map((n) => n.replace(/,/g, ""));
        const found = numbers.length > 0 && numbers.every((n) => evidence.includes(n));
        return found
          ? { claim_index: index, verdict: "unsourced" as const, reasoning: "The research contains these figures." }
          : { claim_index: index, verdict: "suspicious" as const, reasoning: "The research does not contain these figures." };
      });
      return { verdicts };
    },

    async validate(input) {
      await tick();
      const score = scores[Math.min(validateCalls, scores.length - 1)];
      validateCalls += 1;
      const passing = score >= 8;
      return {
        overall_score: score,
        needs_revision: !passing,
        category_scores: [{ category: "structure", score: Math.min(2, score / 5) }],
        issues: passing ? [] : [`${input.sectionNames[0] ?? "Memo"}: needs more specific metrics`],
        suggestions: passing ? [] : ["Add quantitative traction data"],
        strengths: ["Clear structure"]
      };
    },

    async reviseSection(input) {
      await tick();
      const parsed = parseSection(input.section.content);
      const note = `Revised to address: ${input.issues.join("; ") || "general feedback"}.`;
      return renderSection(`${parsed.body}\n\n${note}`, [...parsed.definitions.entries()]);
    }
  };
}
