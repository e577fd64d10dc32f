import fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { InputError } from "../errors.js";
import { isVersionTag } from "../pipeline/versioning.js";

export type OutputMode = "new_version" | "in_place";

export type CorrectionInstruction = {
  type: "inaccurate" | "outdated";
  field: string | null;
  incorrect: string;
  correct: string;
  /** Section hints as written: names, filenames or numbers. */
  sections: string[];
  sources: string[];
};

export type CorrectionsFile = {
  companyName: string;
  sourceVersion: string;
  outputMode: OutputMode;
  dateCreated: string | null;
  corrections: CorrectionInstruction[];
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

// Older files spell the keys differently; fold them onto the current names.
function foldLegacyTopLevel(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const { company, ...rest } = raw;
  return rest.company_name === undefined && company !== undefined ? { ...rest, company_name: company } : raw;
}

function foldLegacyCorrection(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const { inaccurate_information, correct_information, affected_sections, ...rest } = raw;
  return {
    ...rest,
    incorrect: rest.incorrect ?? inaccurate_information,
    correct: rest.correct ?? correct_information,
    sections: rest.sections ?? affected_sections
  };
}

const scalarText = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

const CorrectionSchema = z.preprocess(
  foldLegacyCorrection,
  z
    .object({
      type: z.enum(["inaccurate", "outdated"]).default("inaccurate"),
      field: z.string().trim().min(1).nullable().default(null),
      incorrect: scalarText.pipe(z.string().min(1, "incorrect value must not be empty")),
      correct: scalarText.pipe(z.string().min(1, "correct value must not be empty")),
      sections: z.array(scalarText).default([]),
      sources: z.array(z.string()).default([])
    })
    .strict()
    .refine((c) => c.incorrect !== c.correct, { message: "incorrect and correct values are identical" })
);

const CorrectionsFileSchema = z.preprocess(
  foldLegacyTopLevel,
  z
    .object({
      company_name: z.string().trim().min(1),
      source_version: z
        .string()
        .trim()
        .default("latest")
        .refine((v) => v === "latest" || isVersionTag(v), { message: 'must be "latest" or a version such as v0.0.3' }),
      output_mode: z.enum(["new_version", "in_place"]).default("new_version"),
      date_created: z
        .union([z.string(), z.date()])
        .transform((v) => (typeof v === "string" ? v : v.toISOString().slice(0, 10)))
        .nullable()
        .default(null),
      corrections: z.array(CorrectionSchema).min(1, "corrections list cannot be empty")
    })
    .strict()
);

function describeZodError(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`).join("; ");
}

export function parseCorrections(text: string, source = "corrections YAML"): CorrectionsFile {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new InputError(`Malformed ${source}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const parsed = CorrectionsFileSchema.safeParse(raw);
  if (!parsed.success) throw new InputError(`Invalid ${source}: ${describeZodError(parsed.error)}`);

  const d = parsed.data;
  return {
    companyName: d.company_name,
    sourceVersion: d.source_version,
    outputMode: d.output_mode,
    dateCreated: d.date_created,
    corrections: d.corrections
  };
}

export async function loadCorrectionsFile(filePath: string): Promise<CorrectionsFile> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new InputError(`Corrections file not found: ${filePath}`, { cause: err });
  }
  return parseCorrections(text, filePath);
}
