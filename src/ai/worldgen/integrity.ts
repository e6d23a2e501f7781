/**
 * Integrity Checker
 *
 * Whole-run cross-reference checks over the generated artifact set. Each
 * check is independent and returns human-readable messages; checkIntegrity
 * concatenates them in a fixed order.
 */

import {
  ChapterArtifact,
  MAX_EXITS_BY_ROOM_TYPE,
  ObjectiveType,
  Quest,
  Room,
  RoomGraph,
  isObjectiveType,
  isRoomType,
} from "#worldsmith/ai/worldgen/schemas.js";

export interface IntegrityInput {
  chapters: ChapterArtifact[];
  roomIds: ReadonlySet<string>;
  questIds: ReadonlySet<string>;
  enemyIds: ReadonlySet<string>;
  itemIds: ReadonlySet<string>;
  /** When present, TalkToNPC targets and room npcs are resolved against it. */
  npcIds?: ReadonlySet<string>;
  /** Typed quests, for objective, prerequisite and difficulty checks. */
  quests: Quest[];
  /** Typed rooms, for combat references. */
  rooms?: Room[];
  /** Repaired room graphs, for exit-count checks. */
  roomGraphs?: RoomGraph[];
}

export interface IntegrityResult {
  errors: string[];
  warnings: string[];
}

type TargetKind = "room" | "enemy" | "item" | "npc";

const OBJECTIVE_TARGETS: Record<ObjectiveType, TargetKind | null> = {
  GoToRoom: "room",
  TalkToNPC: "npc",
  CollectItem: "item",
  DeliverItem: "item",
  UseItem: "item",
  DefeatEnemy: "enemy",
  DefeatCount: "enemy",
  SetFlag: null,
  Custom: null,
};

export function checkIntegrity(input: IntegrityInput): IntegrityResult {
  const errors = [
    ...checkSequencing(input.chapters),
    ...checkNonEmptyChapters(input.chapters),
    ...checkUnlockChain(input.chapters, input.questIds),
    ...checkChapterReferences(input),
    ...checkQuestReferences(input),
    ...checkRoomReferences(input),
    ...checkPrerequisiteCycles(input.quests),
    ...checkReachability(input.chapters, input.quests),
  ];
  const warnings = [
    ...checkQuestLocations(input),
    ...checkOversizedRooms(input.roomGraphs ?? []),
    ...checkDifficultyScaling(input.chapters, input.quests),
  ];
  return { errors, warnings };
}

export function checkSequencing(chapters: ChapterArtifact[]): string[] {
  const errors: string[] = [];
  chapters.forEach((chapter, i) => {
    if (chapter.chapterNumber !== i + 1) {
      errors.push(
        `Chapter ${chapter.chapterId} has number ${chapter.chapterNumber}, expected ${i + 1}`
      );
    }
  });
  return errors;
}

export function checkNonEmptyChapters(chapters: ChapterArtifact[]): string[] {
  const errors: string[] = [];
  for (const chapter of chapters) {
    if (chapter.locationIds.length === 0) errors.push(`Chapter ${chapter.chapterId} has no locations`);
    if (chapter.questIds.length === 0) errors.push(`Chapter ${chapter.chapterId} has no quests`);
    if (chapter.mainQuestIds.length === 0) {
      errors.push(`Chapter ${chapter.chapterId} has no main quests; progression cannot advance past it`);
    }
    for (const questId of chapter.mainQuestIds) {
      if (!chapter.questIds.includes(questId)) {
        errors.push(`Chapter ${chapter.chapterId} main quest '${questId}' is not in its quest list`);
      }
    }
  }
  return errors;
}

export function checkUnlockChain(
  chapters: ChapterArtifact[],
  questIds: ReadonlySet<string>
): string[] {
  const errors: string[] = [];
  for (let i = 1; i < chapters.length; i++) {
    const chapter = chapters[i];
    const previous = chapters[i - 1];
    const unlockQuestId = chapter.unlockQuestId;

    if (!unlockQuestId) {
      errors.push(`Chapter ${chapter.chapterId} has no unlock quest`);
      continue;
    }
    if (!previous.mainQuestIds.includes(unlockQuestId)) {
      errors.push(
        `Chapter ${chapter.chapterId} unlock quest '${unlockQuestId}' is not a main quest of ${previous.chapterId}`
      );
    }
    if (!questIds.has(unlockQuestId)) {
      errors.push(`Chapter ${chapter.chapterId} unlock quest '${unlockQuestId}' does not exist`);
    }
  }
  return errors;
}

function checkChapterReferences(input: IntegrityInput): string[] {
  const errors: string[] = [];
  for (const chapter of input.chapters) {
    for (const roomId of chapter.locationIds) {
      if (!input.roomIds.has(roomId)) {
        errors.push(`Chapter ${chapter.chapterId} references missing room '${roomId}'`);
      }
    }
    const designated: Array<[string, string]> = [
      ["hubLocationId", chapter.hubLocationId],
      ["entryLocationId", chapter.entryLocationId],
      ["exitLocationId", chapter.exitLocationId],
    ];
    for (const [field, roomId] of designated) {
      if (roomId && !input.roomIds.has(roomId)) {
        errors.push(`Chapter ${chapter.chapterId} ${field} '${roomId}' not found`);
      }
    }
    for (const questId of chapter.questIds) {
      if (!input.questIds.has(questId)) {
        errors.push(`Chapter ${chapter.chapterId} references missing quest '${questId}'`);
      }
    }
    for (const enemyId of chapter.enemyIds) {
      if (!input.enemyIds.has(enemyId)) {
        errors.push(`Chapter ${chapter.chapterId} references missing enemy '${enemyId}'`);
      }
    }
  }
  return errors;
}

function targetExists(input: IntegrityInput, kind: TargetKind, id: string): boolean {
  switch (kind) {
    case "room":
      return input.roomIds.has(id);
    case "enemy":
      return input.enemyIds.has(id);
    case "item":
      return input.itemIds.has(id);
    case "npc":
      return input.npcIds ? input.npcIds.has(id) : true;
  }
}

function checkQuestReferences(input: IntegrityInput): string[] {
  const errors: string[] = [];
  for (const quest of input.quests) {
    for (const objective of quest.objectives) {
      const kind = isObjectiveType(objective.type) ? OBJECTIVE_TARGETS[objective.type] : null;
      if (!kind || !objective.targetId) continue;
      if (!targetExists(input, kind, objective.targetId)) {
        errors.push(
          `Quest ${quest.questId} objective ${objective.objectiveId} targets missing ${kind} '${objective.targetId}'`
        );
      }
    }
    for (const prerequisiteId of quest.prerequisiteQuests) {
      if (!input.questIds.has(prerequisiteId)) {
        errors.push(`Quest ${quest.questId} requires missing quest '${prerequisiteId}'`);
      }
    }
  }
  return errors;
}

function checkRoomReferences(input: IntegrityInput): string[] {
  const errors: string[] = [];
  for (const room of input.rooms ?? []) {
    const enemyId = room.combat?.enemyId;
    if (enemyId && !input.enemyIds.has(enemyId)) {
      errors.push(`Room ${room.room_id} combat references missing enemy '${enemyId}'`);
    }
  }
  return errors;
}

function checkQuestLocations(input: IntegrityInput): string[] {
  const warnings: string[] = [];
  for (const quest of input.quests) {
    if (quest.questGiverLocation && !input.roomIds.has(quest.questGiverLocation)) {
      warnings.push(`Quest ${quest.questId} giver location '${quest.questGiverLocation}' is not a room`);
    }
    for (const roomId of [...quest.revealsOnAccept, ...quest.revealsOnComplete]) {
      if (!input.roomIds.has(roomId)) {
        warnings.push(`Quest ${quest.questId} reveals unknown room '${roomId}'`);
      }
    }
  }
  for (const room of input.rooms ?? []) {
    for (const npcId of room.npcs) {
      if (input.npcIds && !input.npcIds.has(npcId)) {
        warnings.push(`Room ${room.room_id} lists unknown npc '${npcId}'`);
      }
    }
  }
  return warnings;
}

/**
 * Depth-first walk over prerequisite edges that tracks the active path.
 * A prerequisite already on the path closes a cycle; one that was fully
 * explored through another branch does not. Each cycle is reported once.
 */
export function checkPrerequisiteCycles(quests: Quest[]): string[] {
  const prerequisites = new Map(quests.map((q) => [q.questId, q.prerequisiteQuests]));
  const finished = new Set<string>();
  const reported = new Set<string>();
  const errors: string[] = [];

  const visit = (questId: string, path: string[]): void => {
    path.push(questId);
    for (const prerequisiteId of prerequisites.get(questId) ?? []) {
      if (!prerequisites.has(prerequisiteId) || finished.has(prerequisiteId)) continue;

      const onPath = path.indexOf(prerequisiteId);
      if (onPath !== -1) {
        const cycle = path.slice(onPath);
        const key = canonicalCycle(cycle);
        if (!reported.has(key)) {
          reported.add(key);
          errors.push(`Circular quest prerequisites: ${[...cycle, prerequisiteId].join(" -> ")}`);
        }
        continue;
      }
      visit(prerequisiteId, path);
    }
    path.pop();
    finished.add(questId);
  };

  for (const quest of quests) {
    if (!finished.has(quest.questId)) {
      visit(quest.questId, []);
    }
  }
  return errors;
}

function canonicalCycle(cycle: string[]): string {
  let start = 0;
  cycle.forEach((id, i) => {
    if (id < cycle[start]) start = i;
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)].join(">");
}

export function checkReachability(chapters: ChapterArtifact[], quests: Quest[]): string[] {
  const byId = new Map(quests.map((q) => [q.questId, q]));
  const errors: string[] = [];

  for (const chapter of chapters) {
    if (chapter.mainQuestIds.length === 0) continue;
    const inChapter = new Set(chapter.questIds);
    const startable = chapter.mainQuestIds.some((questId) => {
      const prerequisites = byId.get(questId)?.prerequisiteQuests ?? [];
      return prerequisites.every((p) => !inChapter.has(p));
    });
    if (!startable) {
      errors.push(
        `Chapter ${chapter.chapterId} has no main quest that can be started without another quest from the same chapter`
      );
    }
  }
  return errors;
}

/**
 * Flags rooms whose exit count exceeds the ceiling for their type once
 * reverse edges have been added.
 */
export function checkOversizedRooms(graphs: RoomGraph[]): string[] {
  const warnings: string[] = [];
  for (const graph of graphs) {
    for (const room of graph.rooms) {
      if (!isRoomType(room.roomType)) continue;
      const exits = new Set(room.connectsTo).size;
      const limit = MAX_EXITS_BY_ROOM_TYPE[room.roomType];
      if (exits > limit) {
        warnings.push(
          `Room ${room.roomId} (${room.roomType}) has ${exits} exits after repair (max ${limit})`
        );
      }
    }
  }
  return warnings;
}

export function checkDifficultyScaling(chapters: ChapterArtifact[], quests: Quest[]): string[] {
  const byId = new Map(quests.map((q) => [q.questId, q]));
  const warnings: string[] = [];

  for (const chapter of chapters) {
    for (const questId of chapter.questIds) {
      const quest = byId.get(questId);
      if (!quest) continue;
      if (quest.difficulty < chapter.baseDifficulty - 2) {
        warnings.push(
          `Quest ${questId} difficulty ${quest.difficulty} is low for chapter ${chapter.chapterNumber} (base ${chapter.baseDifficulty})`
        );
      }
      if (chapter.mainQuestIds.includes(questId) && quest.difficulty > chapter.baseDifficulty + 3) {
        warnings.push(
          `Main quest ${questId} difficulty ${quest.difficulty} is high for chapter ${chapter.chapterNumber} (base ${chapter.baseDifficulty})`
        );
      }
    }
  }
  return warnings;
}

export interface ContentCounts {
  rooms: number;
  quests: number;
  enemies: number;
  items: number;
}

export function buildContentReport(
  chapters: ChapterArtifact[],
  counts: ContentCounts,
  issues: IntegrityResult = { errors: [], warnings: [] }
): string {
  const lines = [
    "=== GENERATED CONTENT REPORT ===",
    "",
    `Total Chapters: ${chapters.length}`,
    `Total Rooms: ${counts.rooms}`,
    `Total Quests: ${counts.quests}`,
    `Total Enemies: ${counts.enemies}`,
    `Total Items: ${counts.items}`,
    "",
  ];

  for (const chapter of chapters) {
    lines.push(`--- Chapter ${chapter.chapterNumber}: ${chapter.chapterName} ---`);
    lines.push(`  Locations: ${chapter.locationIds.length}`);
    lines.push(`  Quests: ${chapter.questIds.length} (${chapter.mainQuestIds.length} main)`);
    lines.push(`  Enemies: ${chapter.enemyIds.length}`);
    lines.push(`  Items: ${chapter.itemIds.length}`);
    lines.push(`  Difficulty: ${chapter.baseDifficulty}`);
    lines.push("");
  }

  lines.push(`Errors: ${issues.errors.length}`);
  for (const error of issues.errors) lines.push(`  - ${error}`);
  lines.push(`Warnings: ${issues.warnings.length}`);
  for (const warning of issues.warnings) lines.push(`  - ${warning}`);

  return lines.join("\n");
}
