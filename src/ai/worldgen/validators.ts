/**
 * Schema Validator
 *
 * Turns a raw model response into a typed artifact plus a list of blocking
 * errors and advisory warnings. Nothing here throws: every problem becomes a
 * message in the returned ValidationResult so the orchestrator can decide
 * whether to keep or skip the artifact.
 */

import { ZodError, ZodTypeAny, z } from "zod";
import { extractJsonText, stripMarkdownFences } from "#worldsmith/ai/worldgen/extract-json.js";
import {
  ArtifactKind,
  ChapterOutline,
  ChapterOutlineSchema,
  Enemy,
  EnemySchema,
  Item,
  ItemSchema,
  OBJECTIVE_TYPES,
  Quest,
  QuestSchema,
  ROOM_TYPES,
  Room,
  RoomGraph,
  RoomGraphSchema,
  RoomSchema,
  RoomType,
  isObjectiveType,
  isRoomType,
} from "#worldsmith/ai/worldgen/schemas.js";
import { findMissingReverseEdges } from "#worldsmith/ai/worldgen/room-graph.js";

export type JsonObject = Record<string, unknown>;

export interface ValidationResult<T> {
  errors: string[];
  warnings: string[];
  /** Typed view of the artifact, present when the document matched its schema. */
  parsed?: T;
  /** The well-formed JSON document, present whenever parsing succeeded. */
  document?: JsonObject;
}

export interface ValidateOptions {
  /** Full set of room ids for the run; turns exit checks into resolved-reference checks. */
  knownRoomIds?: ReadonlySet<string>;
  /** Room kind the graph planned for this room. */
  expectedRoomType?: RoomType;
}

export interface ArtifactTypes {
  room: Room;
  quest: Quest;
  enemy: Enemy;
  item: Item;
  outline: ChapterOutline;
  graph: RoomGraph;
}

type ValueValidator<K extends ArtifactKind> = (
  document: JsonObject,
  options: ValidateOptions
) => ValidationResult<ArtifactTypes[K]>;

const VALIDATORS: { [K in ArtifactKind]: ValueValidator<K> } = {
  room: (doc, options) => checkShape(doc, RoomSchema, (room) => checkRoom(room, options)),
  quest: (doc) => checkShape(doc, QuestSchema, checkQuest),
  enemy: (doc) => checkShape(doc, EnemySchema, checkEnemy),
  item: (doc) => checkShape(doc, ItemSchema, checkItem),
  outline: (doc) => checkShape(doc, ChapterOutlineSchema, checkOutline),
  graph: (doc) => checkShape(doc, RoomGraphSchema, checkRoomGraph),
};

/**
 * Validates a raw model response for the given artifact kind.
 */
export function validateArtifact<K extends ArtifactKind>(
  kind: K,
  rawText: string,
  options: ValidateOptions = {}
): ValidationResult<ArtifactTypes[K]> {
  const parsed = parseJsonDocument(rawText);
  if (!parsed.ok) {
    return { errors: parsed.errors, warnings: [] };
  }
  return VALIDATORS[kind](parsed.document, options);
}

/**
 * Validates an already-parsed document, e.g. one loaded back from the
 * content store or kept from an earlier stage.
 */
export function validateArtifactDocument<K extends ArtifactKind>(
  kind: K,
  document: JsonObject,
  options: ValidateOptions = {}
): ValidationResult<ArtifactTypes[K]> {
  return VALIDATORS[kind](document, options);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type ParseOutcome = { ok: true; document: JsonObject } | { ok: false; errors: string[] };

export function parseJsonDocument(rawText: string): ParseOutcome {
  if (!rawText || !rawText.trim()) {
    return { ok: false, errors: ["JSON is empty"] };
  }

  const candidate = extractJsonText(rawText) ?? stripMarkdownFences(rawText);
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const errors = [`JSON parse error: ${message}`];
    if (candidate.includes("```")) {
      errors.push("JSON contains markdown code blocks - output raw JSON only");
    }
    return { ok: false, errors };
  }

  if (!isJsonObject(value)) {
    return { ok: false, errors: ["JSON root must be an object"] };
  }
  return { ok: true, document: value };
}

function formatZodError(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

function checkShape<S extends ZodTypeAny>(
  document: JsonObject,
  schema: S,
  check: (value: z.output<S>) => { errors: string[]; warnings: string[] }
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(document);
  if (!result.success) {
    return { errors: formatZodError(result.error), warnings: [], document };
  }
  const { errors, warnings } = check(result.data);
  return { errors, warnings, parsed: result.data, document };
}

// ---------------------------------------------------------------------------
// Per-kind rules
// ---------------------------------------------------------------------------

function checkRoom(room: Room, options: ValidateOptions) {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!room.room_id) errors.push("room_id is required");
  if (!room.description) errors.push("description is required");

  if (room.room_type && !isRoomType(room.room_type)) {
    warnings.push(`Unknown room_type: '${room.room_type}' (expected: ${ROOM_TYPES.join(", ")})`);
  }
  if (options.expectedRoomType && room.room_type && room.room_type !== options.expectedRoomType) {
    errors.push(`room_type '${room.room_type}' does not match planned type '${options.expectedRoomType}'`);
  }

  if (room.exits.length === 0) {
    warnings.push("Room has no exits defined");
  }
  for (const exit of room.exits) {
    if (!exit.leads_to) {
      errors.push(`Exit '${exit.exit_name}' missing leads_to`);
    } else if (options.knownRoomIds && !options.knownRoomIds.has(exit.leads_to)) {
      errors.push(`Exit '${exit.exit_name}' leads to unknown room: '${exit.leads_to}'`);
    }
  }

  const roomType = room.room_type || options.expectedRoomType;
  if (roomType === "crossroad") {
    if (room.actions.length > 0) errors.push("Crossroad room must not have actions");
    if (room.dialogues.length > 0) errors.push("Crossroad room must not have dialogues");
    if (room.npcs.length > 0) errors.push("Crossroad room must not have npcs");
  }

  if (roomType === "interaction") {
    const actionIds = new Set<string>();
    for (const action of room.actions) {
      if (!action.action_id) {
        errors.push("Action missing action_id");
      } else {
        actionIds.add(action.action_id);
      }
    }
    const speakerIds = new Set<string>();
    for (const dialogue of room.dialogues) {
      if (!dialogue.npc_name) {
        errors.push("Dialogue missing npc_name");
      } else {
        speakerIds.add(dialogue.npc_name);
      }
    }
    for (const actionId of actionIds) {
      if (!speakerIds.has(actionId)) {
        errors.push(`action_id '${actionId}' has no matching dialogue npc_name`);
      }
    }
    for (const speakerId of speakerIds) {
      if (!actionIds.has(speakerId)) {
        errors.push(`dialogue npc_name '${speakerId}' has no matching action_id`);
      }
    }
    if (actionIds.size === 0) {
      warnings.push("Interaction room has no actions");
    }
  }

  if (roomType === "combat" && !room.combat?.enemyId) {
    errors.push("Combat room must reference an enemy in combat.enemyId");
  }

  for (const dialogue of room.dialogues) {
    const label = dialogue.npc_name || "(unnamed)";
    const lastStep = dialogue.dialogues.length - 1;
    if (dialogue.dialogues.length === 0) {
      warnings.push(`NPC '${label}' has no dialogue steps`);
    }
    dialogue.dialogues.forEach((step, i) => {
      if (!step.message) warnings.push(`Dialogue '${label}' step ${i} has empty message`);
      if (step.responses.length === 0) warnings.push(`Dialogue '${label}' step ${i} has no responses`);
      for (const response of step.responses) {
        if (response.next_step !== -1 && (response.next_step < 0 || response.next_step > lastStep)) {
          errors.push(
            `Invalid next_step ${response.next_step} in dialogue '${label}' (max: ${lastStep})`
          );
        }
      }
    });
  }

  return { errors, warnings };
}

function checkQuest(quest: Quest) {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!quest.questId) errors.push("questId is required");
  if (!quest.questName) errors.push("questName is required");
  if (quest.questType !== "Main" && quest.questType !== "Side") {
    errors.push(`questType must be Main or Side, got '${quest.questType}'`);
  }
  if (quest.difficulty < 1 || quest.difficulty > 10) {
    errors.push(`difficulty must be between 1 and 10, got ${quest.difficulty}`);
  }
  if (quest.objectives.length === 0) {
    errors.push("At least one objective is required");
  }

  quest.objectives.forEach((objective, i) => {
    if (!objective.objectiveId) errors.push(`Objective ${i} missing objectiveId`);
    if (!objective.description) warnings.push(`Objective ${i} missing description`);
    if (!objective.targetId) errors.push(`Objective ${i} missing targetId`);
    if (!isObjectiveType(objective.type)) {
      errors.push(
        `Objective ${i} has invalid type: '${objective.type}' (expected: ${OBJECTIVE_TYPES.join(", ")})`
      );
    }
    if (objective.targetCount < 1) {
      errors.push(`Objective ${i} targetCount must be at least 1`);
    }
  });

  if (quest.prerequisiteQuests.includes(quest.questId)) {
    errors.push(`Quest '${quest.questId}' lists itself as a prerequisite`);
  }
  if (quest.rewards.experiencePoints === 0 && quest.rewards.gold === 0 && quest.rewards.itemIds.length === 0) {
    warnings.push("Quest has no rewards defined");
  }

  return { errors, warnings };
}

function checkEnemy(enemy: Enemy) {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!enemy.enemyId) errors.push("enemyId is required");
  if (!enemy.enemyName) errors.push("enemyName is required");
  if (enemy.maxHitPoints <= 0) errors.push("maxHitPoints must be positive");
  if (enemy.armorClass < 0) warnings.push("armorClass is negative");

  if (enemy.attacks.length === 0) {
    warnings.push("Enemy has no attacks defined");
  }
  for (const attack of enemy.attacks) {
    if (!attack.attackName) warnings.push("Attack missing name");
    if (attack.damageMin < 0) errors.push(`Attack '${attack.attackName}' has negative damageMin`);
    if (attack.damageMax < attack.damageMin) {
      errors.push(`Attack '${attack.attackName}' has damageMax < damageMin`);
    }
  }
  for (const loot of enemy.lootTable) {
    if (!loot.itemId) errors.push("Loot entry missing itemId");
    if (loot.dropChance < 0 || loot.dropChance > 1) {
      errors.push(`Loot '${loot.itemId}' dropChance must be between 0 and 1`);
    }
  }

  return { errors, warnings };
}

function checkItem(item: Item) {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!item.itemId) errors.push("itemId is required");
  if (!item.shortDescription) errors.push("shortDescription is required");
  if (item.buyPrice < 0) warnings.push("buyPrice is negative");
  if (item.sellPrice < 0) warnings.push("sellPrice is negative");
  if (item.stacking && item.maxStack <= 0) errors.push("Stacking item must have maxStack > 0");
  if (item.effectType < 0 || item.effectType > 4) {
    errors.push(`effectType must be between 0 and 4, got ${item.effectType}`);
  }
  if (item.target < 0 || item.target > 3) {
    errors.push(`target must be between 0 and 3, got ${item.target}`);
  }

  return { errors, warnings };
}

function checkOutline(outline: ChapterOutline) {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!outline.chapterId) errors.push("chapterId is required");
  if (!outline.chapterName) errors.push("chapterName is required");
  if (outline.locations.length === 0) errors.push("At least one location is required");
  if (outline.mainQuests.length === 0) errors.push("At least one main quest is required");

  const locationIds = new Set<string>();
  for (const location of outline.locations) {
    if (!location.locationId) {
      errors.push("Location missing locationId");
    } else if (locationIds.has(location.locationId)) {
      errors.push(`Duplicate location ID: ${location.locationId}`);
    } else {
      locationIds.add(location.locationId);
    }
  }

  const questIds = new Set<string>();
  for (const quest of [...outline.mainQuests, ...outline.sideQuests]) {
    if (!quest.questId) {
      errors.push("Quest summary missing questId");
      continue;
    }
    if (questIds.has(quest.questId)) {
      errors.push(`Duplicate quest ID: ${quest.questId}`);
    }
    questIds.add(quest.questId);
    if (quest.taskLocation && !locationIds.has(quest.taskLocation)) {
      warnings.push(`Quest '${quest.questId}' references unknown location: ${quest.taskLocation}`);
    }
  }

  for (const enemy of outline.enemies) {
    if (!enemy.enemyId) errors.push("Enemy summary missing enemyId");
  }

  return { errors, warnings };
}

function checkRoomGraph(graph: RoomGraph) {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!graph.chapterId) errors.push("chapterId is required");
  if (graph.rooms.length === 0) {
    errors.push("Room graph has no rooms");
    return { errors, warnings };
  }

  const roomIds = new Set<string>();
  for (const room of graph.rooms) {
    if (!room.roomId) {
      errors.push("Room has empty roomId");
    } else if (roomIds.has(room.roomId)) {
      errors.push(`Duplicate room ID: ${room.roomId}`);
    } else {
      roomIds.add(room.roomId);
    }
  }

  if (!roomIds.has(graph.hubRoomId)) errors.push(`hubRoomId '${graph.hubRoomId}' not found in room list`);
  if (!roomIds.has(graph.entryRoomId)) errors.push(`entryRoomId '${graph.entryRoomId}' not found in room list`);
  if (!roomIds.has(graph.exitRoomId)) errors.push(`exitRoomId '${graph.exitRoomId}' not found in room list`);

  for (const room of graph.rooms) {
    if (!room.roomName) warnings.push(`Room '${room.roomId}' missing roomName`);
    if (!isRoomType(room.roomType)) {
      errors.push(`Room '${room.roomId}' has unknown type: '${room.roomType}'`);
    }
    if (room.connectsTo.length === 0) {
      warnings.push(`Room '${room.roomId}' has no connections (isolated room)`);
    }
    for (const targetId of room.connectsTo) {
      if (!roomIds.has(targetId)) {
        errors.push(`Room '${room.roomId}' connects to non-existent room '${targetId}'`);
      }
    }
    if (room.roomType === "interaction" && room.npcs.length === 0) {
      warnings.push(`Interaction room '${room.roomId}' has no NPCs defined`);
    }
    if (room.roomType === "combat" && !room.enemyId) {
      warnings.push(`Combat room '${room.roomId}' has no enemyId defined`);
    }
  }

  for (const [from, to] of findMissingReverseEdges(graph)) {
    errors.push(`Connection ${from} -> ${to} is not bidirectional`);
  }

  return { errors, warnings };
}
