/**
 * Generate Items Node
 *
 * Items are not planned by the outline. The chapter's items are the ids its
 * quests and enemies point at (objective targets, quest rewards, enemy loot)
 * that no earlier chapter has produced, in first-seen order and capped at
 * itemsPerChapter.
 */

import { JsonObject } from "#worldsmith/ai/worldgen/validators.js";
import { ReportEntry } from "#worldsmith/ai/worldgen/report.js";
import { EnemySchema, ObjectiveType, QuestSchema } from "#worldsmith/ai/worldgen/schemas.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { isCancelled, requestArtifact } from "../../node-shared.js";
import { buildItemPrompt } from "./prompts.js";

const ITEM_OBJECTIVES: ReadonlySet<string> = new Set<ObjectiveType>(["CollectItem", "DeliverItem", "UseItem"]);

/**
 * Item ids referenced by the given quest and enemy documents, each with
 * notes on where it is used. Documents that do not match their schema are
 * skipped.
 */
export function collectItemReferences(
  questDocuments: JsonObject[],
  enemyDocuments: JsonObject[]
): Map<string, string[]> {
  const references = new Map<string, string[]>();
  const add = (itemId: string, usage: string) => {
    if (!itemId) return;
    const notes = references.get(itemId) ?? [];
    notes.push(usage);
    references.set(itemId, notes);
  };

  for (const document of questDocuments) {
    const quest = QuestSchema.safeParse(document);
    if (!quest.success) continue;
    for (const objective of quest.data.objectives) {
      if (ITEM_OBJECTIVES.has(objective.type)) {
        add(objective.targetId, `${objective.type} objective of quest ${quest.data.questId}`);
      }
    }
    for (const itemId of quest.data.rewards.itemIds) {
      add(itemId, `reward of quest ${quest.data.questId}`);
    }
  }

  for (const document of enemyDocuments) {
    const enemy = EnemySchema.safeParse(document);
    if (!enemy.success) continue;
    for (const loot of enemy.data.lootTable) {
      add(loot.itemId, `loot dropped by ${enemy.data.enemyName || enemy.data.enemyId}`);
    }
  }

  return references;
}

export function generateItems(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    const chapterNumber = state.chapterNumber;
    const chapterName = state.outline?.chapterName ?? `Chapter ${chapterNumber}`;

    const pick = (ids: string[], from: Record<string, JsonObject>) =>
      ids.flatMap((id) => (from[id] ? [from[id]] : []));
    const references = collectItemReferences(
      pick(state.chapterQuestIds, state.quests),
      pick(state.chapterEnemyIds, state.enemies)
    );

    const planned = [...references.keys()]
      .filter((itemId) => !state.items[itemId])
      .slice(0, ctx.config.settings.itemsPerChapter);
    if (references.size > planned.length) {
      console.debug(`[generate-items] Chapter ${chapterNumber}: ${references.size} item references, generating ${planned.length}`);
    }

    const items: Record<string, JsonObject> = {};
    const itemIds: string[] = [];
    const report: ReportEntry[] = [];

    if (planned.length > 0) {
      ctx.relay.status(`Chapter ${chapterNumber}: Generating items...`);
    }

    for (const itemId of planned) {
      if (isCancelled(ctx)) break;
      itemIds.push(itemId);

      const prompt = buildItemPrompt({
        itemId,
        chapterNumber,
        chapterName,
        usage: references.get(itemId) ?? [],
      });
      const outcome = await requestArtifact(ctx, "item", "items", itemId, prompt);
      if (outcome.ok) {
        items[itemId] = outcome.document;
      } else {
        report.push(outcome.entry);
      }
    }

    return { items, chapterItemIds: itemIds, report };
  };
}
