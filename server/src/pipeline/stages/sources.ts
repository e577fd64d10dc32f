import path from "node:path";
import { ARTIFACTS } from "../artifacts.js";
import { parseSection, removeCitations } from "../citations.js";
import type { StageDefinition } from "../controller.js";
import { definitionUrl, type SourceCheck } from "../sources.js";
import { orderedSections, type SectionState, type SourceCleanup } from "../state.js";
import { writeJsonFile } from "../utils.js";
import { throwIfAborted, withContent, type StageDeps } from "./common.js";

/**
 * Removes citations whose URL is a placeholder or no longer exists, before the memo is
 * fact-checked and assembled. Unreachable URLs are kept and reported.
 */
export function cleanSourcesStage(deps: StageDeps): StageDefinition {
  return {
    name: "clean_sources",
    reads: ["sections"],
    writes: ["sections", "sourceCleanup"],
    async run(state, ctx) {
      const checks = new Map<string, SourceCheck>();
      const sections: Record<string, SectionState> = {};
      const messages: string[] = [];
      const removed: SourceCleanup["removed"] = [];

      for (const section of orderedSections(state)) {
        const invalid = new Set<string>();
        for (const [id, text] of parseSection(section.content).definitions) {
          const url = definitionUrl(text);
          if (!url) continue;
          let check = checks.get(url);
          if (!check) {
            throwIfAborted(ctx);
            check = await deps.collaborators.checkSource(url);
            checks.set(url, check);
          }
          if (check.status !== "invalid") continue;
          invalid.add(id);
          removed.push({ filename: section.filename, marker: id, url, reason: check.detail });
          messages.push(`clean_sources: removed [^${id}] from ${section.filename} (${check.detail}: ${url})`);
        }
        if (invalid.size === 0) continue;
        sections[section.filename] = withContent(section, removeCitations(section.content, invalid), "clean_sources");
      }

      const sourceCleanup: SourceCleanup = { urlsChecked: checks.size, citationsRemoved: removed.length, removed };
      const unverified = [...checks.values()].filter((c) => c.status === "unverified");
      await writeJsonFile(path.join(ctx.runDir, ARTIFACTS.sourceCheckJson), { ...sourceCleanup, checks: [...checks.values()] });
      ctx.log(`Source check: ${checks.size} URLs, ${removed.length} citations removed, ${unverified.length} unverified`);
      return { sections, sourceCleanup, messages };
    }
  };
}
