/**
 * Generate Outline Node
 *
 * One request per chapter. The outline drives every later node of the
 * chapter, so a transport failure, an unparseable reply, or an outline
 * without locations or main quests aborts the run. Other outline problems
 * are reported and generation continues.
 */

import { validateArtifact } from "#worldsmith/ai/worldgen/validators.js";
import { entriesFromMessages, reportError } from "#worldsmith/ai/worldgen/report.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { abortWith } from "../../node-shared.js";
import { buildOutlinePrompt } from "./prompts.js";

export function generateOutline(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    const chapterNumber = state.chapterNumber;
    const chapterId = `chapter_${chapterNumber}`;
    ctx.relay.status(`Generating Chapter ${chapterNumber}/${state.lastChapterNumber}...`);
    ctx.relay.status(`Chapter ${chapterNumber}: Generating outline...`);

    const previousChapter = state.chapters.find((c) => c.chapterNumber === chapterNumber - 1) ?? null;
    const prompt = buildOutlinePrompt({
      chapterNumber,
      settings: ctx.config.settings,
      previousChapter,
    });

    const response = await ctx.client.send(prompt, ctx.systemPrompt);
    if (!response.ok) {
      return abortWith(ctx, [
        reportError("transport", "outline", `Failed to generate outline: ${response.error}`, chapterId),
      ]);
    }

    const result = validateArtifact("outline", response.content);
    if (!result.parsed) {
      const kind = result.document ? "schema" : "parse";
      return abortWith(ctx, [
        reportError(kind, "outline", `Invalid chapter outline: ${result.errors.join("; ")}`, chapterId),
      ]);
    }

    const outline = { ...result.parsed, chapterId };
    if (outline.locations.length === 0 || outline.mainQuests.length === 0) {
      return abortWith(ctx, entriesFromMessages("schema", "outline", { errors: result.errors, warnings: [] }, chapterId));
    }

    console.debug(
      `[generate-outline] ${chapterId}: ${outline.locations.length} locations, ` +
        `${outline.mainQuests.length} main / ${outline.sideQuests.length} side quests, ` +
        `${outline.enemies.length} enemies`
    );
    ctx.relay.chapterOutline(outline);

    return {
      outline,
      roomGraph: null,
      chapterQuestIds: [],
      chapterMainQuestIds: [],
      chapterEnemyIds: [],
      chapterItemIds: [],
      report: entriesFromMessages("schema", "outline", result, chapterId),
    };
  };
}
