/**
 * Finalize Chapter Node
 *
 * Assembles the ChapterArtifact from the chapter's working values and moves
 * the run on to the next chapter number.
 *
 * Chapter N (N > 1) is unlocked by completing the last main quest of
 * chapter N-1; that quest is also recorded on chapter N-1 as its
 * completionQuestId.
 */

import { ChapterArtifact } from "#worldsmith/ai/worldgen/schemas.js";
import { reportError } from "#worldsmith/ai/worldgen/report.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { abortWith } from "../../node-shared.js";
import { chapterDifficulty } from "../generate-outline/prompts.js";

const last = (ids: string[]): string | null => (ids.length > 0 ? ids[ids.length - 1] : null);

export function buildChapterArtifact(
  state: GenerationStateType,
  generatedAt: Date
): ChapterArtifact | null {
  const { outline, roomGraph: graph, chapterNumber } = state;
  if (!outline || !graph) return null;

  const previous = state.chapters.find((c) => c.chapterNumber === chapterNumber - 1);
  const unlockQuestId =
    chapterNumber > 1 && previous ? previous.completionQuestId ?? last(previous.mainQuestIds) : null;

  return {
    chapterId: outline.chapterId,
    chapterName: outline.chapterName,
    chapterNumber,
    chapterDescription: outline.chapterDescription,
    chapterIntro: outline.chapterIntro,
    unlockQuestId,
    completionQuestId: last(state.chapterMainQuestIds),
    unlockFlags: unlockQuestId ? [`${unlockQuestId}_complete`] : [],
    ...chapterDifficulty(chapterNumber),
    locationIds: [...new Set(graph.rooms.map((r) => r.roomId).filter(Boolean))],
    questIds: state.chapterQuestIds,
    mainQuestIds: state.chapterMainQuestIds,
    enemyIds: state.chapterEnemyIds,
    itemIds: state.chapterItemIds,
    npcIds: outline.keyNPCs.map((n) => n.npcId).filter(Boolean),
    mapId: `${outline.chapterId}_map`,
    hubLocationId: graph.hubRoomId,
    entryLocationId: graph.entryRoomId,
    exitLocationId: graph.exitRoomId,
    generatedAt: generatedAt.toISOString(),
    isGenerated: true,
  };
}

export function finalizeChapter(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    const chapter = buildChapterArtifact(state, ctx.now ? ctx.now() : new Date());
    if (!chapter) {
      return abortWith(ctx, [reportError("schema", "run", `Chapter ${state.chapterNumber} has no outline or room graph`)]);
    }

    const chaptersInRun = state.lastChapterNumber - ctx.firstChapterNumber + 1;
    const done = chapter.chapterNumber - ctx.firstChapterNumber + 1;
    console.log(
      `[finalize-chapter] ${chapter.chapterId}: ${chapter.locationIds.length} rooms, ` +
        `${chapter.questIds.length} quests, ${chapter.enemyIds.length} enemies, ${chapter.itemIds.length} items`
    );
    ctx.relay.chapterGenerated(chapter);
    ctx.relay.progress(done / chaptersInRun);

    return {
      chapters: [chapter],
      chapterNumber: state.chapterNumber + 1,
    };
  };
}
