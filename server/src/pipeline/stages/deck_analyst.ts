import path from "node:path";
import { InputError } from "../../errors.js";
import { ARTIFACTS, renderDeckAnalysisMarkdown, withSectionHeader, writeJsonAndMarkdown, writeSectionFile } from "../artifacts.js";
import { StageCheckpoint } from "../checkpoint.js";
import type { StageDefinition } from "../controller.js";
import { extractDeckText } from "../deck.js";
import { DeckAnalystOutputSchema, type DeckAnalystOutput } from "../schemas.js";
import type { DeckAnalysis } from "../state.js";
import { brief, type StageDeps } from "./common.js";

export function deckAnalystStage(deps: StageDeps): StageDefinition {
  return {
    name: "deck_analyst",
    reads: ["deck", "companyName", "investmentType", "mode"],
    writes: ["deckAnalysis"],
    async run(state, ctx) {
      if (!state.deck) throw new InputError("No deck to analyze");
      const checkpoint = await StageCheckpoint.open(ctx.runDir, "deck_analyst");

      let out: DeckAnalystOutput;
      const cached = checkpoint.get("analysis");
      if (cached) {
        out = DeckAnalystOutputSchema.parse(JSON.parse(cached));
      } else {
        const deckText = await extractDeckText(state.deck);
        if (deckText.length === 0) throw new Error(`No text could be extracted from ${path.basename(state.deck.path)}`);
        ctx.log(`Deck text extracted (${deckText.length} chars)`);
        out = await deps.collaborators.analyzeDeck({ ...brief(state), deckText, sections: ctx.registry.all() });
        await checkpoint.complete("analysis", JSON.stringify(out));
      }

      const messages: string[] = [];
      const drafts: DeckAnalysis["sectionDrafts"] = [];
      for (const draft of out.section_drafts) {
        const def = ctx.registry.byNumber(draft.section_number);
        if (!def) {
          messages.push(`deck_analyst: ignored draft for unknown section ${draft.section_number}`);
          continue;
        }
        await writeSectionFile(ctx.runDir, def.filename, withSectionHeader(def.name, draft.content_markdown), ARTIFACTS.deckSectionsDir);
        drafts.push({ filename: def.filename, name: def.name });
      }

      const analysis: DeckAnalysis = {
        companyName: out.company_name,
        summary: out.summary,
        keyFacts: out.key_facts,
        dataGaps: out.data_gaps,
        sectionDrafts: drafts
      };
      await writeJsonAndMarkdown(
        ctx.runDir,
        ARTIFACTS.deckAnalysisJson,
        analysis,
        ARTIFACTS.deckAnalysisMd,
        renderDeckAnalysisMarkdown(analysis)
      );
      ctx.log(`Deck analysis: ${analysis.keyFacts.length} facts, ${drafts.length} section drafts`);
      return { deckAnalysis: analysis, messages };
    }
  };
}
