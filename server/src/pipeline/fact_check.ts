import { inlineMarkers } from "./citations.js";
import type { SectionFactCheck } from "./state.js";

export type ClaimKind =
  | "funding_round"
  | "valuation"
  | "pricing"
  | "growth"
  | "metric"
  | "financial"
  | "percentage"
  | "date"
  | "team_size"
  | "named_party";

export type Claim = {
  text: string;
  kind: ClaimKind;
  cited: boolean;
};

export type ClaimVerdict = "verified" | "unsourced" | "suspicious";

export type CheckedClaim = Claim & { verdict: ClaimVerdict; reasoning: string };

// First match wins, so the narrower patterns come first.
const CLAIM_PATTERNS: Array<[ClaimKind, RegExp]> = [
  ["funding_round", /\$[\d.,]+\s*[KMB]?\w*\s+(?:seed|pre-seed|series [a-z]|round|bridge)\b/i],
  ["valuation", /\$[\d.,]+\s*[KMB]?\w*\s+(?:valuation|pre-money|post-money)\b/i],
  ["pricing", /\$[\d.,]+\s*[KMB]?\s*(?:per|\/)\s*(?:month|user|seat|year|license)\b/i],
  ["growth", /\b\d+(?:\.\d+)?%\s+(?:MoM|YoY|month[- ]over[- ]month|year[- ]over[- ]year|CAGR|growth)/i],
  ["metric", /\b\d[\d,.]*\s*[KMB]?\s+(?:ARR|MRR|customers?|users?|MAU|DAU|clients?|downloads?)\b/i],
  ["financial", /\$\d[\d,.]*/],
  ["percentage", /\b\d+(?:\.\d+)?%/],
  ["date", /\b(?:Q[1-4]|Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+20\d{2}\b/],
  ["team_size", /\b\d+\s+(?:people|employees|team members|engineers|FTEs?)\b/i],
  ["named_party", /\b(?:customers include|clients include|partnership with|backed by|investors include)\s+[A-Z]/i]
];

const HIGH_RISK: ReadonlySet<ClaimKind> = new Set<ClaimKind>(["funding_round", "valuation", "pricing", "growth", "metric", "financial"]);

const UNDISCLOSED_RE = /\b(?:not disclosed|undisclosed|not publicly available|data not available|not available)\b/i;
const SENTENCE_SPLIT_RE = /(?<=[.!?]["”')]*(?:\[\^\d+\])*)\s+/;

const PASS_RATIO = 0.8;

function claimLines(body: string): string[] {
  return body
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !/^(?:#|\||!\[|\*\*Links:\*\*)/.test(l))
    .map((l) => l.replace(/^(?:[-*+]|\d+\.)\s+/, ""));
}

/**
 * Sentences in a section body that state a checkable fact. Tables, headings, images and
 * the links line are not prose and are passed over.
 */
export function extractClaims(body: string): Claim[] {
  const claims: Claim[] = [];
  for (const line of claimLines(body)) {
    for (const sentence of line.split(SENTENCE_SPLIT_RE)) {
      const text = sentence.trim();
      if (text.length === 0 || UNDISCLOSED_RE.test(text)) continue;
      const match = CLAIM_PATTERNS.find(([, re]) => re.test(text));
      if (!match) continue;
      claims.push({ text, kind: match[0], cited: inlineMarkers(text).length > 0 });
    }
  }
  return claims;
}

function isHighRisk(kind: ClaimKind): boolean {
  return HIGH_RISK.has(kind);
}

/**
 * A section passes when at least `PASS_RATIO` of its claims are cited and no high-risk
 * claim is unsupported by the research.
 */
export function summarizeSection(filename: string, name: string, claims: CheckedClaim[]): SectionFactCheck {
  const count = (v: ClaimVerdict) => claims.filter((c) => c.verdict === v).length;
  const verified = count("verified");
  const score = claims.length === 0 ? 1 : Number((verified / claims.length).toFixed(2));
  const flagged = claims.filter((c) => c.verdict === "suspicious" && isHighRisk(c.kind)).map((c) => c.text);
  return {
    filename,
    name,
    totalClaims: claims.length,
    verified,
    unsourced: count("unsourced"),
    suspicious: count("suspicious"),
    score,
    requiresRewrite: flagged.length > 0 || score < PASS_RATIO,
    flagged
  };
}

export function factCheckIssues(section: SectionFactCheck): string[] {
  if (!section.requiresRewrite) return [];
  const uncited = section.unsourced + section.suspicious;
  return [
    `${section.name}: ${uncited} of ${section.totalClaims} factual claims lack a citation`,
    ...section.flagged.map((claim) => `${section.name}: claim not supported by research: ${claim}`)
  ];
}
