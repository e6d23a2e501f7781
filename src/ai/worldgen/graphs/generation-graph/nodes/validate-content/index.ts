/**
 * Validate Content Node
 *
 * Schema-validates every stored artifact once (rooms against the full set of
 * generated room ids) and then runs the integrity checks over the whole
 * run. Everything found becomes a report entry; nothing here blocks
 * persistence.
 */

import { JsonObject, validateArtifactDocument } from "#worldsmith/ai/worldgen/validators.js";
import { buildContentReport, checkIntegrity } from "#worldsmith/ai/worldgen/integrity.js";
import { ReportEntry, countBySeverity, entriesFromMessages } from "#worldsmith/ai/worldgen/report.js";
import { Quest, Room, RoomType, isRoomType } from "#worldsmith/ai/worldgen/schemas.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";

export interface ContentValidation {
  entries: ReportEntry[];
  summary: string;
}

type ArtifactSetView = Pick<
  GenerationStateType,
  "chapters" | "rooms" | "quests" | "enemies" | "items" | "roomGraphs"
>;

export function validateContent(content: ArtifactSetView): ContentValidation {
  const entries: ReportEntry[] = [];
  const roomIds = new Set(Object.keys(content.rooms));

  const plannedTypes = new Map<string, RoomType>();
  for (const [chapterId, graph] of Object.entries(content.roomGraphs)) {
    const graphDocument: JsonObject = graph;
    entries.push(
      ...entriesFromMessages("schema", "validate", validateArtifactDocument("graph", graphDocument), `${chapterId}_map`)
    );
    for (const node of graph.rooms) {
      if (isRoomType(node.roomType)) plannedTypes.set(node.roomId, node.roomType);
    }
  }

  const rooms: Room[] = [];
  for (const [roomId, document] of Object.entries(content.rooms)) {
    const result = validateArtifactDocument("room", document, {
      knownRoomIds: roomIds,
      expectedRoomType: plannedTypes.get(roomId),
    });
    entries.push(...entriesFromMessages("schema", "validate", result, roomId));
    if (result.parsed) rooms.push(result.parsed);
  }

  const quests: Quest[] = [];
  for (const [questId, document] of Object.entries(content.quests)) {
    const result = validateArtifactDocument("quest", document);
    entries.push(...entriesFromMessages("schema", "validate", result, questId));
    if (result.parsed) quests.push(result.parsed);
  }

  for (const [enemyId, document] of Object.entries(content.enemies)) {
    entries.push(...entriesFromMessages("schema", "validate", validateArtifactDocument("enemy", document), enemyId));
  }
  for (const [itemId, document] of Object.entries(content.items)) {
    entries.push(...entriesFromMessages("schema", "validate", validateArtifactDocument("item", document), itemId));
  }

  const integrity = checkIntegrity({
    chapters: content.chapters,
    roomIds,
    questIds: new Set(Object.keys(content.quests)),
    enemyIds: new Set(Object.keys(content.enemies)),
    itemIds: new Set(Object.keys(content.items)),
    npcIds: new Set(content.chapters.flatMap((c) => c.npcIds)),
    quests,
    rooms,
    roomGraphs: Object.values(content.roomGraphs),
  });
  entries.push(...entriesFromMessages("integrity", "validate", integrity));

  const summary = buildContentReport(
    content.chapters,
    {
      rooms: roomIds.size,
      quests: Object.keys(content.quests).length,
      enemies: Object.keys(content.enemies).length,
      items: Object.keys(content.items).length,
    },
    integrity
  );

  return { entries, summary };
}

export function validateContentNode(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    ctx.relay.status("Validating generated content...");

    const { entries, summary } = validateContent(state);
    const { errorCount, warningCount } = countBySeverity(entries);
    if (errorCount === 0) {
      ctx.relay.status("Validation passed!");
    } else {
      ctx.relay.status(`Validation found ${errorCount} error(s) and ${warningCount} warning(s)`);
    }
    ctx.relay.validationReport(summary);

    return { report: entries, validationSummary: summary };
  };
}
