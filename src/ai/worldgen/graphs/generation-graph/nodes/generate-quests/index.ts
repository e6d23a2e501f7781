/**
 * Generate Quests Node
 *
 * Main quests first, then side quests. Planned quest ids are kept in the
 * chapter even when a request fails, and main quest ids are tracked apart
 * from the rest for the chapter unlock chain. A quest id an earlier chapter
 * already lists is reported and left out of this chapter.
 */

import { JsonObject } from "#worldsmith/ai/worldgen/validators.js";
import { ReportEntry, reportError } from "#worldsmith/ai/worldgen/report.js";
import { QuestSummary } from "#worldsmith/ai/worldgen/schemas.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { abortWith, earlierOwner, isCancelled, requestArtifact } from "../../node-shared.js";
import { buildQuestPrompt } from "./prompts.js";

export function generateQuests(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    const { outline, roomGraph: graph } = state;
    if (!outline || !graph) {
      return abortWith(ctx, [reportError("schema", "quests", "No chapter outline to generate quests from")]);
    }

    const chapterNumber = state.chapterNumber;
    const planned: Array<{ quest: QuestSummary; isMain: boolean }> = [
      ...outline.mainQuests.map((quest) => ({ quest, isMain: true })),
      ...outline.sideQuests.map((quest) => ({ quest, isMain: false })),
    ];
    const roomIds = graph.rooms.map((r) => r.roomId);
    const priorQuestIds = Object.keys(state.quests);

    const quests: Record<string, JsonObject> = {};
    const questIds: string[] = [];
    const mainQuestIds: string[] = [];
    const report: ReportEntry[] = [];

    ctx.relay.status(`Chapter ${chapterNumber}: Generating quests...`);

    for (const { quest, isMain } of planned) {
      if (isCancelled(ctx)) break;
      if (!quest.questId || questIds.includes(quest.questId)) continue;

      const owner = earlierOwner(state, "questIds", quest.questId);
      if (owner) {
        const message = `Quest '${quest.questId}' already belongs to ${owner}; left out of this chapter`;
        console.warn(`[generate-quests] ${message}`);
        report.push(reportError("integrity", "quests", message, quest.questId));
        continue;
      }

      questIds.push(quest.questId);
      if (isMain) mainQuestIds.push(quest.questId);

      const prompt = buildQuestPrompt({
        quest,
        isMain,
        chapterNumber,
        outline,
        roomIds,
        priorQuestIds: [...priorQuestIds, ...Object.keys(quests)],
      });
      const outcome = await requestArtifact(ctx, "quest", "quests", quest.questId, prompt);
      if (outcome.ok) {
        quests[quest.questId] = outcome.document;
      } else {
        report.push(outcome.entry);
      }
    }

    return {
      quests,
      chapterQuestIds: questIds,
      chapterMainQuestIds: mainQuestIds,
      report,
    };
  };
}
