import type { MatcherKind } from "../config.js";
import { variantMatcherAgent } from "../pipeline/agents.js";
import { createStructuredRunners, runStructuredAgentOutput, type RunnerBundle } from "../pipeline/agent_runner.js";
import { VariantMatcherOutputSchema } from "../pipeline/schemas.js";
import type { CorrectionInstruction } from "./config.js";

/**
 * Produces the other spellings of an instruction's incorrect value. The exact value is
 * always matched by the engine; matchers only add variants.
 */
export type CorrectionMatcher = {
  readonly name: string;
  variants: (instruction: CorrectionInstruction) => Promise<string[]>;
};

export type TextMatch = {
  index: number;
  text: string;
};

type Scale = { size: number; suffixes: string[]; word: string };

const SCALES: Scale[] = [
  { size: 1e9, suffixes: ["B", "bn"], word: "billion" },
  { size: 1e6, suffixes: ["M", "MM", "mn"], word: "million" },
  { size: 1e3, suffixes: ["K"], word: "thousand" }
];

const UNIT_SIZES: Record<string, number> = {
  k: 1e3,
  thousand: 1e3,
  m: 1e6,
  mm: 1e6,
  mn: 1e6,
  million: 1e6,
  b: 1e9,
  bn: 1e9,
  billion: 1e9
};

const ONES = ["zero", "one", "two", "three", "four", "five", "six", "seven", "eight", "nine", "ten", "eleven", "twelve", "thirteen", "fourteen", "fifteen", "sixteen", "seventeen", "eighteen", "nineteen"];
const TENS = ["", "", "twenty", "thirty", "forty", "fifty", "sixty", "seventy", "eighty", "ninety"];

const AMOUNT_RE =
  /^([$€£])?\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?\s*(k|thousand|mm|mn|m|million|bn|b|billion)?(?:\s+(?:dollars|usd))?$/i;

export type ParsedAmount = { currency: string; value: number };

export function parseAmount(text: string): ParsedAmount | null {
  const m = AMOUNT_RE.exec(text.trim());
  if (!m) return null;
  const whole = Number(m[2].replace(/,/g, ""));
  const value = m[3] ? Number(`${whole}.${m[3]}`) : whole;
  const unit = m[4] ? UNIT_SIZES[m[4].toLowerCase()] : 1;
  if (!Number.isFinite(value) || unit === undefined) return null;
  return { currency: m[1] ?? "", value: Math.round(value * unit * 100) / 100 };
}

export function numberWords(n: number): string | null {
  if (!Number.isInteger(n) || n < 0 || n > 999) return null;
  if (n < 20) return ONES[n];
  if (n < 100) return n % 10 === 0 ? TENS[Math.floor(n / 10)] : `${TENS[Math.floor(n / 10)]}-${ONES[n % 10]}`;
  const rest = n % 100;
  const head = `${ONES[Math.floor(n / 100)]} hundred`;
  return rest === 0 ? head : `${head} ${numberWords(rest)}`;
}

function withCommas(n: number): string {
  return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

function scaled(n: number): string {
  return String(Number(n.toFixed(2)));
}

function uniqueForms(forms: string[], exclude: string[]): string[] {
  const seen = new Set(exclude.map((f) => f.toLowerCase()));
  const out: string[] = [];
  for (const f of forms) {
    const t = f.trim();
    const key = t.toLowerCase();
    if (t.length === 0 || seen.has(key)) continue;
    seen.add(key);
    out.push(t);
  }
  return out;
}

/**
 * Money and number spellings of the same amount: `$50M`, `$50MM`, `$50 million`,
 * `$50,000,000`, `fifty million dollars`, ...
 */
export function numericVariants(value: string): string[] {
  const amount = parseAmount(value);
  if (!amount) return [];
  const { currency: c, value: v } = amount;
  const forms: string[] = [];

  const scale = SCALES.find((s) => v >= s.size);
  if (scale) {
    const s = scaled(v / scale.size);
    for (const suffix of scale.suffixes) forms.push(`${c}${s}${suffix}`);
    forms.push(`${c}${s} ${scale.word}`);
    if (c === "$") forms.push(`${s} ${scale.word} dollars`);
    const words = numberWords(Number(s));
    if (words) {
      forms.push(`${words} ${scale.word}`);
      if (c === "$") forms.push(`${words} ${scale.word} dollars`);
    }
  }

  if (Number.isInteger(v)) {
    forms.push(`${c}${withCommas(v)}`);
    forms.push(`${c}${v}`);
  }

  return uniqueForms(forms, [value]);
}

export const exactMatcher: CorrectionMatcher = {
  name: "exact",
  async variants() {
    return [];
  }
};

export const numericMatcher: CorrectionMatcher = {
  name: "numeric",
  async variants(instruction) {
    return numericVariants(instruction.incorrect);
  }
};

export function compositeMatcher(matchers: CorrectionMatcher[]): CorrectionMatcher {
  return {
    name: matchers.map((m) => m.name).join("+"),
    async variants(instruction) {
      const all: string[] = [];
      for (const m of matchers) all.push(...(await m.variants(instruction)));
      return uniqueForms(all, [instruction.incorrect, instruction.correct]);
    }
  };
}

export function llmMatcher(options: { signal: AbortSignal; log: (message: string) => void; bundle?: RunnerBundle }): CorrectionMatcher {
  const bundle = options.bundle ?? createStructuredRunners();
  return {
    name: "llm",
    async variants(instruction) {
      const prompt = [
        `INCORRECT VALUE: ${instruction.incorrect}`,
        `FIELD: ${instruction.field ?? "unspecified"}`,
        `CORRECT VALUE (do not list): ${instruction.correct}`
      ].join("\n");
      const out = await runStructuredAgentOutput(
        {
          label: variantMatcherAgent.name,
          prompt,
          invoke: async (runner, p) => (await runner.run(variantMatcherAgent, p, { maxTurns: 3, signal: options.signal })).finalOutput,
          parse: (v) => VariantMatcherOutputSchema.parse(v)
        },
        bundle,
        options.log
      );
      return uniqueForms(out.variants, [instruction.incorrect, instruction.correct]);
    }
  };
}

export function createMatcher(
  kind: MatcherKind,
  llm?: { signal: AbortSignal; log: (message: string) => void; bundle?: RunnerBundle }
): CorrectionMatcher {
  if (kind === "exact") return exactMatcher;
  if (kind === "numeric") return numericMatcher;
  if (!llm) throw new Error("The llm matcher needs an abort signal and a log sink");
  return compositeMatcher([numericMatcher, llmMatcher(llm)]);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function formSource(form: string): string {
  const body = escapeRegExp(form).replace(/\s+/g, "\\s+");
  // "fifty million" must not match inside "one hundred fifty million".
  return /^[a-z]/i.test(form) ? `(?<!(?:hundred|thousand|and)[\\s-]+|-)${body}` : body;
}

/**
 * Case-insensitive pattern for any of the forms, anchored so that `$50M` never matches
 * inside `$150M`, `$50MM` or `$50,000,000,000`.
 */
export function formsPattern(forms: string[]): RegExp {
  const alts = [...forms].sort((a, b) => b.length - a.length).map(formSource);
  return new RegExp(`(?<![\\w$€£]|\\d[.,])(?:${alts.join("|")})(?!\\w|[.,]\\d)`, "gi");
}

export function findMatches(text: string, forms: string[]): TextMatch[] {
  if (forms.length === 0) return [];
  const out: TextMatch[] = [];
  for (const m of text.matchAll(formsPattern(forms))) {
    out.push({ index: m.index ?? 0, text: m[0] });
  }
  return out;
}
