import { Agent, webSearchTool } from "@openai/agents";
import { loadConfig } from "../config.js";
import {
  DeckAnalystOutputSchema,
  FactCheckOutputSchema,
  ResearcherOutputSchema,
  ScorecardOutputSchema,
  SectionOutputSchema,
  SocialsOutputSchema,
  ValidatorOutputSchema,
  VariantMatcherOutputSchema
} from "./schemas.js";

const baseModel = loadConfig().model;
const baseSettings = { temperature: 0.2 };

const CITATION_RULES = `Citation rules:
- Cite with inline footnote markers [^1], [^2], ... numbered from 1 within this section, placed after the punctuation they support.
- End the section with a "### Citations" heading followed by one definition per marker, separated by blank lines, in exactly this shape:
  [^1]: 2024-05-01. [Article title](https://example.com/path). Publisher Name. Published: 2024-05-01 | Updated: N/A
- Every marker needs a definition and every definition needs a marker. Never invent URLs.`;

export const deckAnalystAgent = new Agent({
  name: "Deck Analyst",
  handoffDescription: "Extracts facts and initial section drafts from a pitch deck.",
  model: baseModel,
  modelSettings: baseSettings,
  tools: [],
  outputType: DeckAnalystOutputSchema,
  instructions: `You are the Deck Analyst on an investment team.

You will receive the text of a pitch deck and the memo outline (section number, name, description).

Rules:
- Extract the facts the deck states (round size, valuation, revenue, customers, team, market) as key_facts.
- List what the deck does not disclose as data_gaps (e.g. "Team backgrounds not disclosed in deck").
- For each outline section the deck actually covers, write a short draft in markdown (no heading line) into section_drafts.
- Attribute deck claims to the company ("the company reports ..."). Do not add outside knowledge.
- Return ONLY valid JSON matching the output schema.`
});

export const researcherAgent = new Agent({
  name: "Researcher",
  handoffDescription: "Researches the company on the web.",
  model: baseModel,
  modelSettings: { ...baseSettings, toolChoice: "required" },
  tools: [webSearchTool()],
  outputType: ResearcherOutputSchema,
  instructions: `You are the Researcher on an investment team.

Research the company named in the prompt using web search: product, market, competitors, funding history, team and traction.

Rules:
- Every finding and metric must reference entries in "sources" by zero-based index.
- Sources need title, url, publisher and published date (YYYY-MM-DD when known); updated is null when unknown.
- Report the company website as company_url when found, otherwise null.
- Prefer primary and reputable sources. Do not invent sources.
- Return ONLY valid JSON matching the output schema.`
});

export const sectionWriterAgent = new Agent({
  name: "Section Writer",
  handoffDescription: "Writes one memo section with citations.",
  model: baseModel,
  modelSettings: baseSettings,
  tools: [],
  outputType: SectionOutputSchema,
  instructions: `You are the Writer on an investment team. You write ONE section of an investment memo at a time.

You will receive the section definition (name, description, guiding questions, target length), the memo mode,
the research pack, and possibly a draft of the same section derived from the pitch deck.

Rules:
- If a deck draft is provided, keep its facts and extend it with research; do not discard it.
- Be specific: numbers, names, dates. Avoid vague claims.
- Start with the line "# <Section Name>".
- Do not write other sections.
${CITATION_RULES}
- Return ONLY valid JSON: {"content_markdown": "..."}`
});

export const linkEnricherAgent = new Agent({
  name: "Link Enricher",
  handoffDescription: "Adds hyperlinks to organizations and people mentioned in a section.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [webSearchTool()],
  outputType: SectionOutputSchema,
  instructions: `You add markdown hyperlinks to the first mention of notable organizations, investors and products in ONE memo section.

Rules:
- Change nothing else: no rewording, no new sentences.
- Keep every footnote marker and every citation definition exactly as given.
- Only link URLs you verified with web search.
- Return ONLY valid JSON: {"content_markdown": "..."}`
});

export const socialsAgent = new Agent({
  name: "Socials Finder",
  handoffDescription: "Finds official company profiles.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [webSearchTool()],
  outputType: SocialsOutputSchema,
  instructions: `Find the official website, LinkedIn company page, X/Twitter profile and Crunchbase profile for the company.

Rules:
- Only return URLs you found with web search and that clearly belong to this company; otherwise null.
- Return ONLY valid JSON matching the output schema.`
});

export const scorecardAgent = new Agent({
  name: "Scorecard Evaluator",
  handoffDescription: "Scores the memo against a scorecard template.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [],
  outputType: ScorecardOutputSchema,
  instructions: `You score an investment opportunity on each dimension of the scorecard template provided.

Rules:
- Use only the memo sections and research provided as evidence.
- Give each dimension (by id) an integer score within the template's scale and a one or two sentence rationale.
- overall is the mean of the dimension scores.
- Return ONLY valid JSON matching the output schema.`
});

export const citationEnricherAgent = new Agent({
  name: "Citation Enricher",
  handoffDescription: "Adds citations to unsupported claims in a section.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [webSearchTool()],
  outputType: SectionOutputSchema,
  instructions: `You add citations to factual claims in ONE memo section that lack them.

Rules:
- Keep every existing marker and definition. Add new markers with the next free numbers.
- Do not reword the text except to attach markers.
- If no supporting source exists for a claim, leave it uncited.
${CITATION_RULES}
- Return ONLY valid JSON: {"content_markdown": "..."}`
});

export const summaryReviserAgent = new Agent({
  name: "Summary Reviser",
  handoffDescription: "Rewrites the opening or closing section against the finished memo.",
  model: baseModel,
  modelSettings: baseSettings,
  tools: [],
  outputType: SectionOutputSchema,
  instructions: `You rewrite ONE bookend section (the executive summary or the closing recommendation) of an investment memo
so it reflects what the full memo body actually says.

Rules:
- Keep the "# <Section Name>" heading.
- Use only facts that appear in the memo. Do not add new claims.
- Keep every footnote marker and every citation definition exactly as given; add none.
- Return ONLY valid JSON: {"content_markdown": "..."}`
});

export const factCheckerAgent = new Agent({
  name: "Fact Checker",
  handoffDescription: "Checks uncited claims against the research sources.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [],
  outputType: FactCheckOutputSchema,
  instructions: `You check numbered factual claims from ONE memo section against the research gathered for the memo.

For every claim return a verdict:
- "unsourced": the research supports the claim, but the memo does not cite it.
- "suspicious": the research does not contain or contradicts the claim.

Rules:
- Judge only against the research provided; never assume outside knowledge.
- claim_index is the number shown before the claim.
- Return ONLY valid JSON matching the output schema.`
});

export const validatorAgent = new Agent({
  name: "Validator",
  handoffDescription: "Scores memo quality and lists issues.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [],
  outputType: ValidatorOutputSchema,
  instructions: `You are the Validator. You review a complete investment memo draft.

Score 0-10 across: structure, metric specificity, risk analysis, tone, source attribution.
- 9-10: exceptional, ready for partners
- 8: high quality, minor revisions only
- below 8: needs revision

Rules:
- Be rigorous. Do not inflate scores.
- Issues must name the section they concern (e.g. "Market Context: TAM claim has no citation").
- Return ONLY valid JSON matching the output schema.`
});

export const reviserAgent = new Agent({
  name: "Reviser",
  handoffDescription: "Revises one section to address validator feedback.",
  model: baseModel,
  modelSettings: baseSettings,
  tools: [],
  outputType: SectionOutputSchema,
  instructions: `You revise ONE section of an investment memo to address the validator's issues and suggestions.

Rules:
- Keep the "# <Section Name>" heading.
- Keep every cited fact and its citation unless the feedback says it is wrong.
${CITATION_RULES}
- Return ONLY valid JSON: {"content_markdown": "..."}`
});

export const variantMatcherAgent = new Agent({
  name: "Variant Matcher",
  handoffDescription: "Lists the ways a value may be written in a memo.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [],
  outputType: VariantMatcherOutputSchema,
  instructions: `Given an incorrect value and its field, list the other ways the same value could be written in prose
(abbreviations, spelled-out numbers, different units). Return only strings that mean exactly the same value.
Return ONLY valid JSON: {"variants": ["..."]}`
});

export const sectionRewriterAgent = new Agent({
  name: "Section Rewriter",
  handoffDescription: "Applies a factual correction throughout one section.",
  model: baseModel,
  modelSettings: { temperature: 0 },
  tools: [],
  outputType: SectionOutputSchema,
  instructions: `You apply a factual correction to ONE memo section.

Rules:
- Replace the incorrect value with the correct one wherever it appears, and adjust figures derived from it.
- Keep every footnote marker and every citation definition exactly as given.
- Change nothing unrelated to the correction.
- Return ONLY valid JSON: {"content_markdown": "..."}`
});
