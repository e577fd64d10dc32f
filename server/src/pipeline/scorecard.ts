import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { InputError } from "../errors.js";
import { dataRootAbs } from "./utils.js";

const DimensionSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  description: z.string().default(""),
  questions: z.array(z.string()).default([])
});

export const ScorecardTemplateSchema = z.object({
  scorecard_id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  description: z.string().default(""),
  applicable_types: z.array(z.enum(["direct", "fund"])).default(["direct", "fund"]),
  scale: z
    .object({
      min: z.number().int(),
      max: z.number().int(),
      labels: z.record(z.string()).default({})
    })
    .refine((s) => s.max > s.min, { message: "scale.max must exceed scale.min" }),
  dimensions: z.array(DimensionSchema).min(1)
});

export type ScorecardTemplate = z.infer<typeof ScorecardTemplateSchema>;

export async function loadScorecard(nameOrPath: string): Promise<ScorecardTemplate> {
  const file =
    nameOrPath.endsWith(".yaml") || nameOrPath.includes("/")
      ? path.resolve(nameOrPath)
      : path.join(dataRootAbs(), "scorecards", `${nameOrPath}.yaml`);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    throw new InputError(`Scorecard not found: ${nameOrPath}`, { cause: err });
  }
  const parsed = ScorecardTemplateSchema.safeParse(parseYaml(raw));
  if (!parsed.success) throw new InputError(`Invalid scorecard ${file}: ${parsed.error.message}`);
  return parsed.data;
}

type DimensionScore = { dimension: string; score: number; rationale: string };

export const SCORECARD_BLOCK_PREFIX = "#### Scorecard:";

function scoreTable(template: ScorecardTemplate, scores: DimensionScore[]): string[] {
  const lines = ["| Dimension | Score | Rationale |", "|---|---|---|"];
  for (const dim of template.dimensions) {
    const s = scores.find((x) => x.dimension === dim.id);
    const label = s ? template.scale.labels[String(s.score)] : undefined;
    const cell = s ? `${s.score}/${template.scale.max}${label ? ` (${label})` : ""}` : "n/a";
    lines.push(`| ${dim.name} | ${cell} | ${s ? s.rationale.replace(/\|/g, "/") : ""} |`);
  }
  return lines;
}

export function renderScorecardMarkdown(template: ScorecardTemplate, scores: DimensionScore[]): string {
  return [`# ${template.name}`, "", ...scoreTable(template, scores)].join("\n");
}

/**
 * The scorecard as it appears inside a memo section.
 */
export function scorecardBlock(template: ScorecardTemplate, scores: DimensionScore[], overall: number): string {
  return [
    `${SCORECARD_BLOCK_PREFIX} ${template.name}`,
    "",
    ...scoreTable(template, scores),
    "",
    `**Overall:** ${overall}/${template.scale.max}`
  ].join("\n");
}
