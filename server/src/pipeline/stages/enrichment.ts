import { parseSection } from "../citations.js";
import type { StageContext, StageDefinition } from "../controller.js";
import { StageCheckpoint } from "../checkpoint.js";
import { orderedSections, type PipelineState, type SectionState, type StageName } from "../state.js";
import { appendToBody, brief, citationsPreserved, insertAfterTitle, throwIfAborted, toReview, withContent, type StageDeps } from "./common.js";

const METRICS_HEADING = "#### Key Metrics";

function firstSection(state: PipelineState): SectionState | null {
  return orderedSections(state)[0] ?? null;
}

export function enrichTrademarkStage(): StageDefinition {
  return {
    name: "enrich_trademark",
    reads: ["trademark", "sections", "companyName"],
    writes: ["sections"],
    async run(state, ctx) {
      const logo = state.trademark?.light ?? state.trademark?.dark ?? null;
      const target = firstSection(state);
      if (!logo || !target) return {};

      const alt = `${state.companyName} logo`;
      if (target.content.includes(`![${alt}]`)) return {};
      const updated = withContent(target, insertAfterTitle(target.content, `![${alt}](${logo})`), "enrich_trademark");
      ctx.log(`Inserted trademark into ${target.filename}`);
      return { sections: { [target.filename]: updated } };
    }
  };
}

export function enrichSocialsStage(deps: StageDeps): StageDefinition {
  return {
    name: "enrich_socials",
    reads: ["companyUrl", "research", "sections"],
    writes: ["socials", "sections"],
    async run(state, ctx) {
      const companyUrl = state.companyUrl ?? state.research?.companyUrl ?? null;
      if (!companyUrl) return {};
      const socials = await deps.collaborators.findSocials({ ...brief(state), companyUrl });

      const links = [
        ["Website", socials.website],
        ["LinkedIn", socials.linkedin],
        ["X", socials.twitter],
        ["Crunchbase", socials.crunchbase]
      ]
        .filter((pair): pair is [string, string] => typeof pair[1] === "string" && pair[1].length > 0)
        .map(([label, url]) => `[${label}](${url})`);

      const target = firstSection(state);
      if (links.length === 0 || !target || target.content.includes("**Links:**")) return { socials };
      const updated = withContent(target, insertAfterTitle(target.content, `**Links:** ${links.join(" | ")}`), "enrich_socials");
      return { socials, sections: { [target.filename]: updated } };
    }
  };
}

async function perSection(
  state: PipelineState,
  ctx: StageContext,
  stage: StageName,
  rewrite: (section: SectionState) => Promise<string>,
  allowNewCitations: boolean
): Promise<{ sections: Record<string, SectionState>; messages: string[]; changed: number }> {
  const checkpoint = await StageCheckpoint.open(ctx.runDir, stage);
  const sections: Record<string, SectionState> = {};
  const messages: string[] = [];
  let changed = 0;

  for (const section of orderedSections(state)) {
    throwIfAborted(ctx);
    let content = checkpoint.get(section.filename);
    if (content === null) {
      const candidate = await rewrite(section);
      if (citationsPreserved(section.content, candidate, allowNewCitations)) {
        content = candidate;
      } else {
        messages.push(`${stage}: kept original ${section.filename} (rewrite altered existing citations)`);
        content = section.content;
      }
      await checkpoint.complete(section.filename, content);
    }
    if (content.trimEnd() === section.content.trimEnd()) continue;
    sections[section.filename] = withContent(section, content, stage);
    changed += 1;
  }
  return { sections, messages, changed };
}

export function enrichLinksStage(deps: StageDeps): StageDefinition {
  return {
    name: "enrich_links",
    reads: ["sections"],
    writes: ["sections"],
    async run(state, ctx) {
      const { sections, messages, changed } = await perSection(
        state,
        ctx,
        "enrich_links",
        (s) => deps.collaborators.enrichLinks({ ...brief(state), section: toReview(s) }),
        false
      );
      ctx.log(`Link enrichment changed ${changed} sections`);
      return { sections, messages };
    }
  };
}

export function metricsTable(metrics: Array<{ label: string; value: string }>): string {
  const rows = metrics.map((m) => `| ${m.label.replace(/\|/g, "/")} | ${m.value.replace(/\|/g, "/")} |`);
  return [METRICS_HEADING, "", "| Metric | Value |", "|---|---|", ...rows].join("\n");
}

export function enrichTablesStage(): StageDefinition {
  return {
    name: "enrich_tables",
    reads: ["research", "sections"],
    writes: ["sections"],
    async run(state, ctx) {
      const metrics = state.research?.metrics ?? [];
      if (metrics.length === 0) return {};

      const preferred = [...ctx.registry.forField("revenue"), ...ctx.registry.forField("track_record"), ...ctx.registry.forField("metrics")];
      const target = preferred.map((d) => state.sections[d.filename]).find((s) => s !== undefined) ?? firstSection(state);
      if (!target || target.content.includes(METRICS_HEADING)) return {};

      const updated = withContent(target, appendToBody(target.content, metricsTable(metrics)), "enrich_tables");
      ctx.log(`Inserted metrics table into ${target.filename}`);
      return { sections: { [target.filename]: updated } };
    }
  };
}

export function citationEnrichmentStage(deps: StageDeps): StageDefinition {
  return {
    name: "citation_enrichment",
    reads: ["sections"],
    writes: ["sections", "citationEnrichment"],
    async run(state, ctx) {
      const before = new Map(orderedSections(state).map((s) => [s.filename, parseSection(s.content).markers.length]));
      const { sections, messages, changed } = await perSection(
        state,
        ctx,
        "citation_enrichment",
        (s) => deps.collaborators.enrichCitations({ ...brief(state), section: toReview(s) }),
        true
      );
      let citationsAdded = 0;
      for (const s of Object.values(sections)) {
        citationsAdded += Math.max(0, parseSection(s.content).markers.length - (before.get(s.filename) ?? 0));
      }
      ctx.log(`Citation enrichment: ${citationsAdded} citations added across ${changed} sections`);
      return { sections, messages, citationEnrichment: { sectionsEnriched: changed, citationsAdded } };
    }
  };
}
