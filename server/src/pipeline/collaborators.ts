import type { SectionDefinition, InvestmentType, MemoMode } from "./outline.js";
import type { ScorecardTemplate } from "./scorecard.js";
import type { DeckAnalystOutput, FactCheckOutput, ResearcherOutput, ScorecardOutput, SocialsOutput, ValidatorOutput } from "./schemas.js";
import type { SourceCheck } from "./sources.js";
import type { Research } from "./state.js";

export type CompanyBrief = {
  companyName: string;
  investmentType: InvestmentType;
  mode: MemoMode;
};

export type SectionForReview = {
  number: number;
  name: string;
  content: string;
};

/**
 * The LLM-backed and network work a memo run delegates. Implementations return plain data;
 * stages own file layout, merging and checkpoints.
 */
export type MemoCollaborators = {
  analyzeDeck(input: CompanyBrief & { deckText: string; sections: readonly SectionDefinition[] }): Promise<DeckAnalystOutput>;
  research(
    input: CompanyBrief & {
      companyUrl: string | null;
      description: string | null;
      stage: string | null;
      notes: string | null;
      deckFacts: Array<{ label: string; value: string }>;
    }
  ): Promise<ResearcherOutput>;
  writeSection(
    input: CompanyBrief & { section: SectionDefinition; research: Research | null; deckDraft: string | null }
  ): Promise<string>;
  enrichLinks(input: CompanyBrief & { section: SectionForReview }): Promise<string>;
  findSocials(input: CompanyBrief & { companyUrl: string }): Promise<SocialsOutput>;
  scoreCard(
    input: CompanyBrief & { template: ScorecardTemplate; sections: SectionForReview[]; research: Research | null }
  ): Promise<ScorecardOutput>;
  enrichCitations(input: CompanyBrief & { section: SectionForReview }): Promise<string>;
  /** Rewrites an opening or closing section so it reflects the full memo. */
  reviseSummary(input: CompanyBrief & { section: SectionForReview; memo: string }): Promise<string>;
  checkSource(url: string): Promise<SourceCheck>;
  /** Verdicts for the uncited claims, by index into `claims`. */
  factCheck(
    input: CompanyBrief & { section: SectionForReview; claims: string[]; research: Research | null }
  ): Promise<FactCheckOutput>;
  validate(input: CompanyBrief & { memo: string; sectionNames: string[] }): Promise<ValidatorOutput>;
  reviseSection(
    input: CompanyBrief & { section: SectionForReview; issues: string[]; suggestions: string[] }
  ): Promise<string>;
};
