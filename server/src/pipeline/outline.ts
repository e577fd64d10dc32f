import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { InputError } from "../errors.js";
import { dataRootAbs, slug } from "./utils.js";

export type InvestmentType = "direct" | "fund";
export type MemoMode = "consider" | "justify";

const TargetLengthSchema = z.object({
  min_words: z.number().int().nonnegative(),
  max_words: z.number().int().positive(),
  ideal_words: z.number().int().positive()
});

const ModeSpecificSchema = z
  .object({
    consider: z.string().optional(),
    justify: z.string().optional()
  })
  .strict();

const SectionYamlSchema = z
  .object({
    number: z.number().int().positive(),
    name: z.string().trim().min(1),
    filename: z.string().regex(/^\d{2}-[a-z0-9-]+\.md$/, "filename must look like NN-slug.md"),
    target_length: TargetLengthSchema.optional(),
    description: z.string().default(""),
    guiding_questions: z.array(z.string()).default([]),
    section_vocabulary: z.record(z.array(z.string())).default({}),
    field_hints: z.array(z.string()).default([]),
    mode_specific: ModeSpecificSchema.default({}),
    validation_criteria: z.array(z.string()).default([])
  })
  .strict();

const SectionOverrideSchema = SectionYamlSchema.omit({ number: true, filename: true }).partial().strict();

const OutlineYamlSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().default(""),
    investment_type: z.enum(["direct", "fund"]).optional(),
    extends: z.string().trim().min(1).optional(),
    sections: z.array(SectionYamlSchema).optional(),
    section_overrides: z.record(SectionOverrideSchema).default({})
  })
  .strict();

type SectionYaml = z.infer<typeof SectionYamlSchema>;

export type SectionDefinition = {
  number: number;
  name: string;
  filename: string;
  targetLength?: { minWords: number; maxWords: number; idealWords: number };
  description: string;
  guidingQuestions: string[];
  vocabulary: Record<string, string[]>;
  fieldHints: string[];
  modeSpecific: { consider?: string; justify?: string };
  validationCriteria: string[];
};

export function sectionFilename(number: number, name: string): string {
  return `${String(number).padStart(2, "0")}-${slug(name)}.md`;
}

function normalizeKey(s: string): string {
  return s
    .trim()
    .toLowerCase()
    .replace(/\.md$/, "")
    .replace(/[^a-z0-9]+/g, "");
}

function toDefinition(s: SectionYaml): SectionDefinition {
  return {
    number: s.number,
    name: s.name,
    filename: s.filename,
    targetLength: s.target_length
      ? { minWords: s.target_length.min_words, maxWords: s.target_length.max_words, idealWords: s.target_length.ideal_words }
      : undefined,
    description: s.description,
    guidingQuestions: s.guiding_questions,
    vocabulary: s.section_vocabulary,
    fieldHints: s.field_hints.map(normalizeKey),
    modeSpecific: s.mode_specific,
    validationCriteria: s.validation_criteria
  };
}

/**
 * Ordered, validated view over an outline's sections. Section numbers are
 * contiguous from 1 and every filename is unique.
 */
export class SectionRegistry {
  readonly outlineName: string;
  private readonly ordered: SectionDefinition[];

  constructor(outlineName: string, sections: SectionDefinition[]) {
    this.outlineName = outlineName;
    this.ordered = [...sections].sort((a, b) => a.number - b.number);
    const problems = SectionRegistry.validate(this.ordered);
    if (problems.length > 0) throw new InputError(`Invalid outline "${outlineName}": ${problems.join("; ")}`);
  }

  static validate(sorted: SectionDefinition[]): string[] {
    const problems: string[] = [];
    if (sorted.length === 0) problems.push("no sections");
    const filenames = new Set<string>();
    const names = new Set<string>();
    sorted.forEach((s, i) => {
      if (s.number !== i + 1) problems.push(`section numbers must be contiguous from 1 (found ${s.number} at position ${i + 1})`);
      if (filenames.has(s.filename)) problems.push(`duplicate filename ${s.filename}`);
      filenames.add(s.filename);
      const key = normalizeKey(s.name);
      if (names.has(key)) problems.push(`duplicate section name ${s.name}`);
      names.add(key);
      if (!s.filename.startsWith(`${String(s.number).padStart(2, "0")}-`)) {
        problems.push(`filename ${s.filename} does not match section number ${s.number}`);
      }
    });
    return problems;
  }

  get size(): number {
    return this.ordered.length;
  }

  all(): readonly SectionDefinition[] {
    return this.ordered;
  }

  byNumber(n: number): SectionDefinition | null {
    return this.ordered.find((s) => s.number === n) ?? null;
  }

  byFilename(filename: string): SectionDefinition | null {
    return this.ordered.find((s) => s.filename === filename) ?? null;
  }

  /**
   * Resolves a free-form hint: a section name ("Executive Summary"), a filename with or
   * without extension, a bare slug ("executive-summary") or a section number.
   */
  resolve(hint: string): SectionDefinition | null {
    const trimmed = hint.trim();
    if (/^\d+$/.test(trimmed)) return this.byNumber(Number(trimmed));
    const key = normalizeKey(trimmed);
    if (!key) return null;
    return (
      this.ordered.find((s) => normalizeKey(s.filename) === key) ??
      this.ordered.find((s) => normalizeKey(s.name) === key) ??
      this.ordered.find((s) => normalizeKey(s.filename).replace(/^\d+/, "") === key) ??
      null
    );
  }

  forField(field: string): SectionDefinition[] {
    const key = normalizeKey(field);
    if (!key) return [];
    return this.ordered.filter((s) => s.fieldHints.includes(key));
  }
}

function outlinesDirAbs(): string {
  return path.join(dataRootAbs(), "outlines");
}

function outlinePath(nameOrPath: string): string {
  if (nameOrPath.endsWith(".yaml") || nameOrPath.endsWith(".yml") || nameOrPath.includes("/")) return path.resolve(nameOrPath);
  return path.join(outlinesDirAbs(), `${nameOrPath}.yaml`);
}

async function readOutlineYaml(nameOrPath: string): Promise<z.infer<typeof OutlineYamlSchema>> {
  const file = outlinePath(nameOrPath);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    throw new InputError(`Outline not found: ${nameOrPath}`, { cause: err });
  }
  const parsed = OutlineYamlSchema.safeParse(parseYaml(raw));
  if (!parsed.success) throw new InputError(`Invalid outline file ${file}: ${parsed.error.message}`);
  return parsed.data;
}

async function resolveSections(nameOrPath: string, seen: string[]): Promise<{ name: string; sections: SectionYaml[] }> {
  if (seen.includes(nameOrPath)) throw new InputError(`Outline inheritance cycle: ${[...seen, nameOrPath].join(" -> ")}`);
  const doc = await readOutlineYaml(nameOrPath);

  let sections: SectionYaml[];
  if (doc.sections) {
    sections = doc.sections;
  } else if (doc.extends) {
    sections = (await resolveSections(doc.extends, [...seen, nameOrPath])).sections;
  } else {
    throw new InputError(`Outline "${doc.name}" has neither sections nor extends`);
  }

  const overrides = Object.entries(doc.section_overrides);
  if (overrides.length === 0) return { name: doc.name, sections };

  const out = sections.map((s) => ({ ...s }));
  for (const [key, patch] of overrides) {
    const idx = out.findIndex((s) => normalizeKey(s.name) === normalizeKey(key) || normalizeKey(s.filename) === normalizeKey(key));
    if (idx === -1) throw new InputError(`Outline "${doc.name}" overrides unknown section "${key}"`);
    out[idx] = { ...out[idx], ...patch };
  }
  return { name: doc.name, sections: out };
}

export function defaultOutlineName(investmentType: InvestmentType): string {
  return investmentType;
}

export async function loadOutline(nameOrPath: string): Promise<SectionRegistry> {
  const { name, sections } = await resolveSections(nameOrPath, []);
  return new SectionRegistry(name, sections.map(toDefinition));
}
