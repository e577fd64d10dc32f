import { z } from "zod";

// Agent output schemas. Structured outputs reject optional fields, so absent values are `null`.

const SourceOutSchema = z.object({
  title: z.string().min(1),
  url: z.string().min(1),
  publisher: z.string().min(1),
  published: z.string().min(1),
  updated: z.string().nullable()
});

export const DeckAnalystOutputSchema = z.object({
  company_name: z.string().min(1),
  summary: z.string().min(1),
  key_facts: z.array(z.object({ label: z.string().min(1), value: z.string().min(1) })),
  data_gaps: z.array(z.string()),
  section_drafts: z.array(
    z.object({
      section_number: z.number().int().positive(),
      content_markdown: z.string().min(1)
    })
  )
});

export const ResearcherOutputSchema = z.object({
  summary: z.string().min(1),
  company_url: z.string().nullable(),
  findings: z.array(
    z.object({
      topic: z.string().min(1),
      detail: z.string().min(1),
      source_indexes: z.array(z.number().int().nonnegative())
    })
  ),
  metrics: z.array(
    z.object({
      label: z.string().min(1),
      value: z.string().min(1),
      source_index: z.number().int().nonnegative().nullable()
    })
  ),
  sources: z.array(SourceOutSchema)
});

export const SectionOutputSchema = z.object({
  content_markdown: z.string().min(1)
});

export const SocialsOutputSchema = z.object({
  website: z.string().nullable(),
  linkedin: z.string().nullable(),
  twitter: z.string().nullable(),
  crunchbase: z.string().nullable()
});

export const ScorecardOutputSchema = z.object({
  scores: z.array(
    z.object({
      dimension: z.string().min(1),
      score: z.number(),
      rationale: z.string().min(1)
    })
  ),
  overall: z.number()
});

export const ValidatorOutputSchema = z.object({
  overall_score: z.number().min(0).max(10),
  needs_revision: z.boolean(),
  category_scores: z.array(z.object({ category: z.string().min(1), score: z.number() })),
  issues: z.array(z.string()),
  suggestions: z.array(z.string()),
  strengths: z.array(z.string())
});

export const FactCheckOutputSchema = z.object({
  verdicts: z.array(
    z.object({
      claim_index: z.number().int().nonnegative(),
      verdict: z.enum(["unsourced", "suspicious"]),
      reasoning: z.string().min(1)
    })
  )
});

export const VariantMatcherOutputSchema = z.object({
  variants: z.array(z.string().min(1))
});

export type DeckAnalystOutput = z.infer<typeof DeckAnalystOutputSchema>;
export type ResearcherOutput = z.infer<typeof ResearcherOutputSchema>;
export type SectionOutput = z.infer<typeof SectionOutputSchema>;
export type SocialsOutput = z.infer<typeof SocialsOutputSchema>;
export type ScorecardOutput = z.infer<typeof ScorecardOutputSchema>;
export type ValidatorOutput = z.infer<typeof ValidatorOutputSchema>;
export type FactCheckOutput = z.infer<typeof FactCheckOutputSchema>;
export type VariantMatcherOutput = z.infer<typeof VariantMatcherOutputSchema>;
