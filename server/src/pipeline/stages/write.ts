import path from "node:path";
import { ARTIFACTS, withSectionHeader } from "../artifacts.js";
import { StageCheckpoint } from "../checkpoint.js";
import type { StageDefinition } from "../controller.js";
import type { SectionState } from "../state.js";
import { tryReadTextFile } from "../utils.js";
import { brief, throwIfAborted, type StageDeps } from "./common.js";

/**
 * Writes every outline section in order. Sections finished before an interruption are
 * taken from the stage checkpoint instead of being written again.
 */
export function writeStage(deps: StageDeps): StageDefinition {
  return {
    name: "write",
    reads: ["research", "deckAnalysis", "mode", "investmentType"],
    writes: ["sections"],
    async run(state, ctx) {
      const checkpoint = await StageCheckpoint.open(ctx.runDir, "write");
      const sections: Record<string, SectionState> = {};
      const messages: string[] = [];

      for (const def of ctx.registry.all()) {
        throwIfAborted(ctx);
        const deckDraft = await tryReadTextFile(path.join(ctx.runDir, ARTIFACTS.deckSectionsDir, def.filename));

        let content = checkpoint.get(def.filename);
        if (content === null) {
          const raw = await deps.collaborators.writeSection({ ...brief(state), section: def, research: state.research, deckDraft });
          content = raw.trim().length > 0 ? `${withSectionHeader(def.name, raw).trimEnd()}\n` : "";
          await checkpoint.complete(def.filename, content);
          ctx.log(`Wrote ${def.filename}`);
        } else {
          ctx.log(`Reused ${def.filename} from checkpoint`);
        }

        if (content.length === 0) {
          messages.push(`write: no content produced for ${def.name}`);
          continue;
        }

        sections[def.filename] = {
          number: def.number,
          name: def.name,
          filename: def.filename,
          content,
          provenance: deckDraft ? "deck" : "research",
          updatedBy: "write"
        };
      }

      if (Object.keys(sections).length === 0) messages.push("write: writer produced zero sections");
      return { sections, messages };
    }
  };
}
