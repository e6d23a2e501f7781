/**
 * World generation data model.
 *
 * Every shape that crosses a boundary (caller input, model output, content
 * store files) is declared here once as a zod schema; the TypeScript types
 * are inferred from the schemas. Model-output schemas default missing fields
 * to empty values so that "required" checks in the validators can report
 * them by name instead of surfacing zod's generic "Required" message.
 */

import { z } from "zod";

export const ROOM_TYPES = ["crossroad", "interaction", "combat"] as const;
export const LOCATION_TYPES = ["hub", "exploration", "dungeon", "boss", "transition"] as const;
export const OBJECTIVE_TYPES = [
  "GoToRoom",
  "TalkToNPC",
  "CollectItem",
  "DeliverItem",
  "DefeatEnemy",
  "DefeatCount",
  "SetFlag",
  "UseItem",
  "Custom",
] as const;
export const QUEST_TYPES = ["Main", "Side"] as const;
export const NPC_ROLES = ["quest_giver", "merchant", "mentor", "antagonist", "citizen"] as const;
export const ITEM_CATEGORIES = ["weapon", "armor", "consumable", "key", "quest"] as const;

/** Exit-count ceilings per room type, as stated in the room graph prompt. */
export const MAX_EXITS_BY_ROOM_TYPE: Record<RoomType, number> = {
  crossroad: 4,
  interaction: 2,
  combat: 2,
};

export type RoomType = (typeof ROOM_TYPES)[number];
export type LocationType = (typeof LOCATION_TYPES)[number];
export type ObjectiveType = (typeof OBJECTIVE_TYPES)[number];
export type ArtifactKind = "room" | "quest" | "enemy" | "item" | "outline" | "graph";

export function isRoomType(value: string): value is RoomType {
  return ROOM_TYPES.some((t) => t === value);
}

export function isObjectiveType(value: string): value is ObjectiveType {
  return OBJECTIVE_TYPES.some((t) => t === value);
}

const text = () => z.string().default("");
const idList = () => z.array(z.string()).default([]);

// Models sometimes emit the literal string "null" for absent ids.
const optionalId = () =>
  z
    .string()
    .nullable()
    .optional()
    .transform((v) => (v && v !== "null" ? v : null));

// ---------------------------------------------------------------------------
// Caller input
// ---------------------------------------------------------------------------

export const WorldBriefSchema = z.object({
  worldName: z.string().min(1),
  theme: text(),
  tone: text(),
  era: text(),
  settingDescription: text(),
  keyLocations: idList(),
  majorFactions: idList(),
  mainConflict: text(),
  protagonistRole: text(),
  narrativeThemes: idList(),
  writingStyle: text(),
  dialogueTone: text(),
  customParameters: z
    .array(z.object({ key: z.string(), value: z.string() }))
    .default([]),
});

export const GenerationSettingsSchema = z.object({
  totalChapters: z.number().int().min(1).max(20).default(5),
  locationsPerChapter: z.number().int().min(1).max(50).default(10),
  subLocationsPerMajor: z.number().int().min(0).max(10).default(2),
  questsPerChapter: z.number().int().min(1).max(30).default(7),
  mainQuestsPerChapter: z.number().int().min(1).max(10).default(2),
  enemyTypesPerChapter: z.number().int().min(0).max(20).default(5),
  itemsPerChapter: z.number().int().min(0).max(50).default(10),
  npcsPerChapter: z.number().int().min(0).max(30).default(8),
  difficultyVariance: z.number().min(0).max(1).default(0.3),
  allowHardSideQuests: z.boolean().default(true),
  hardSideQuestChance: z.number().min(0).max(100).default(20),
  hubLocationRatio: z.number().min(0).max(1).default(0.2),
  questRevealedRatio: z.number().min(0).max(1).default(0.6),
});

export const ProviderConfigSchema = z.object({
  provider: z.enum(["anthropic", "openai"]).default("openai"),
  model: z.string().min(1).default("gpt-4"),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokensPerRequest: z.number().int().min(1).default(4000),
  requestDelayMs: z.number().int().min(0).default(1000),
  maxRetries: z.number().int().min(1).max(10).default(3),
  retryDelayMs: z.number().int().min(0).default(2000),
});

export const WorldGenerationConfigSchema = z.object({
  configId: z.string().min(1).optional(),
  configName: z.string().default("Untitled World"),
  storyId: z
    .string()
    .regex(/^[a-z0-9_-]+$/, "storyId must be snake_case or kebab-case")
    .optional(),
  storyDescription: z.string().optional(),
  worldBrief: WorldBriefSchema,
  settings: GenerationSettingsSchema.default({}),
  provider: ProviderConfigSchema.default({}),
});

export type WorldBrief = z.infer<typeof WorldBriefSchema>;
export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderName = ProviderConfig["provider"];
export type WorldGenerationConfigInput = z.input<typeof WorldGenerationConfigSchema>;
export type WorldGenerationConfig = z.infer<typeof WorldGenerationConfigSchema>;

// ---------------------------------------------------------------------------
// Chapter outline
// ---------------------------------------------------------------------------

export const LocationSummarySchema = z.object({
  locationId: text(),
  locationName: text(),
  locationType: z.string().default("exploration"),
  description: text(),
  alwaysVisible: z.boolean().default(false),
  connectedTo: idList(),
});

export const QuestSummarySchema = z.object({
  questId: text(),
  questName: text(),
  description: text(),
  questGiver: text(),
  taskLocation: text(),
  difficulty: z.number().default(1),
});

export const NpcSummarySchema = z.object({
  npcId: text(),
  npcName: text(),
  role: z.string().default("citizen"),
  personality: text(),
  locationId: text(),
});

export const EnemySummarySchema = z.object({
  enemyId: text(),
  enemyName: text(),
  enemyType: text(),
  challengeRating: z.number().default(1),
  description: text(),
});

export const ChapterOutlineSchema = z.object({
  chapterId: text(),
  chapterName: text(),
  chapterDescription: text(),
  chapterIntro: text(),
  hubLocationId: text(),
  entryLocationId: text(),
  exitLocationId: text(),
  locations: z.array(LocationSummarySchema).default([]),
  mainQuests: z.array(QuestSummarySchema).default([]),
  sideQuests: z.array(QuestSummarySchema).default([]),
  keyNPCs: z.array(NpcSummarySchema).default([]),
  enemies: z.array(EnemySummarySchema).default([]),
});

export type LocationSummary = z.infer<typeof LocationSummarySchema>;
export type QuestSummary = z.infer<typeof QuestSummarySchema>;
export type NpcSummary = z.infer<typeof NpcSummarySchema>;
export type EnemySummary = z.infer<typeof EnemySummarySchema>;
export type ChapterOutline = z.infer<typeof ChapterOutlineSchema>;

// ---------------------------------------------------------------------------
// Room graph
// ---------------------------------------------------------------------------

export const RoomNodeSchema = z.object({
  roomId: text(),
  roomName: text(),
  roomType: text(),
  description: text(),
  connectsTo: idList(),
  npcs: idList(),
  enemyId: optionalId(),
  isHub: z.boolean().default(false),
});

export const RoomGraphSchema = z.object({
  chapterId: text(),
  hubRoomId: text(),
  entryRoomId: text(),
  exitRoomId: text(),
  rooms: z.array(RoomNodeSchema).default([]),
});

export type RoomNode = z.infer<typeof RoomNodeSchema>;
export type RoomGraph = z.infer<typeof RoomGraphSchema>;

// ---------------------------------------------------------------------------
// Generated artifacts (field names follow the game runtime's file format)
// ---------------------------------------------------------------------------

export const RoomExitSchema = z.object({
  exit_name: text(),
  leads_to: text(),
  conditions: idList(),
  conditions_not: idList(),
});

export const RoomActionSchema = z.object({
  action_id: text(),
  action_description: text(),
});

export const DialogueResponseSchema = z.object({
  text: text(),
  next_step: z.number().int(),
});

export const DialogueStepSchema = z.object({
  message: text(),
  responses: z.array(DialogueResponseSchema).default([]),
});

export const NpcDialogueSchema = z.object({
  npc_name: text(),
  dialogue_image: z.string().default("npc_default"),
  dialogues: z.array(DialogueStepSchema).default([]),
});

export const RoomCombatSchema = z.object({
  enemyId: text(),
  isBoss: z.boolean().default(false),
  defeatFlag: text(),
});

export const RoomSchema = z
  .object({
    room_id: text(),
    room_type: text(),
    description: text(),
    npcs: idList(),
    items: z.array(z.unknown()).default([]),
    actions: z.array(RoomActionSchema).default([]),
    dialogues: z.array(NpcDialogueSchema).default([]),
    exits: z.array(RoomExitSchema).default([]),
    combat: RoomCombatSchema.nullable().default(null),
    events: z.array(z.unknown()).default([]),
  })
  .passthrough();

export const QuestObjectiveSchema = z.object({
  objectiveId: text(),
  description: text(),
  type: text(),
  targetId: text(),
  targetCount: z.number().int().default(1),
  isOptional: z.boolean().default(false),
});

export const QuestFlagSchema = z.object({
  flagName: text(),
  flagValue: z
    .union([z.string(), z.boolean(), z.number()])
    .default("true")
    .transform((v) => String(v)),
});

export const QuestRewardsSchema = z.object({
  experiencePoints: z.number().default(0),
  gold: z.number().default(0),
  itemIds: idList(),
  flagsToSet: z.array(QuestFlagSchema).default([]),
});

export const QuestSchema = z
  .object({
    questId: text(),
    questName: text(),
    questDescription: text(),
    questGiver: text(),
    questGiverLocation: text(),
    questType: z.string().default("Side"),
    chapterNumber: z.number().int().default(0),
    difficulty: z.number().default(1),
    prerequisiteQuests: idList(),
    prerequisiteFlags: idList(),
    objectives: z.array(QuestObjectiveSchema).default([]),
    revealsOnAccept: idList(),
    revealsOnComplete: idList(),
    rewards: QuestRewardsSchema.default({}),
    state: z.string().default("NotStarted"),
  })
  .passthrough();

export const EnemyAttackSchema = z.object({
  attackName: text(),
  attackDescription: text(),
  damageMin: z.number().default(0),
  damageMax: z.number().default(0),
  hitBonus: z.number().default(0),
});

export const LootEntrySchema = z.object({
  itemId: text(),
  dropChance: z.number().default(0),
});

export const EnemySchema = z
  .object({
    enemyId: text(),
    enemyName: text(),
    description: text(),
    enemyImage: z.string().default("enemy_default"),
    maxHitPoints: z.number().default(0),
    currentHitPoints: z.number().optional(),
    armorClass: z.number().default(10),
    experienceValue: z.number().default(0),
    goldDrop: z.number().default(0),
    attacks: z.array(EnemyAttackSchema).default([]),
    lootTable: z.array(LootEntrySchema).default([]),
  })
  .passthrough();

export const ItemSchema = z
  .object({
    itemId: text(),
    shortDescription: text(),
    description: text(),
    usageSuccess: text(),
    usageFail: text(),
    category: text(),
    effectType: z.number().int().default(0),
    effectAmount: z.number().default(0),
    target: z.number().int().default(0),
    stacking: z.boolean().default(false),
    maxStack: z.number().int().default(1),
    buyPrice: z.number().default(0),
    sellPrice: z.number().default(0),
    image: z.string().default("item_default"),
    combatUsable: z.boolean().default(false),
  })
  .passthrough();

export type RoomExit = z.infer<typeof RoomExitSchema>;
export type Room = z.infer<typeof RoomSchema>;
export type QuestObjective = z.infer<typeof QuestObjectiveSchema>;
export type Quest = z.infer<typeof QuestSchema>;
export type Enemy = z.infer<typeof EnemySchema>;
export type Item = z.infer<typeof ItemSchema>;

// ---------------------------------------------------------------------------
// Persisted run records
// ---------------------------------------------------------------------------

export const ChapterArtifactSchema = z.object({
  chapterId: z.string(),
  chapterName: z.string(),
  chapterNumber: z.number().int().min(1),
  chapterDescription: text(),
  chapterIntro: text(),
  unlockQuestId: z.string().nullable().default(null),
  completionQuestId: z.string().nullable().default(null),
  unlockFlags: idList(),
  baseDifficulty: z.number(),
  minEnemyCR: z.number(),
  maxEnemyCR: z.number(),
  locationIds: idList(),
  questIds: idList(),
  mainQuestIds: idList(),
  enemyIds: idList(),
  itemIds: idList(),
  npcIds: idList(),
  mapId: text(),
  hubLocationId: text(),
  entryLocationId: text(),
  exitLocationId: text(),
  generatedAt: text(),
  isGenerated: z.boolean().default(true),
});

export type ChapterArtifact = z.infer<typeof ChapterArtifactSchema>;

export const StoryManifestSchema = z.object({
  storyId: z.string(),
  storyName: z.string(),
  storyDescription: z.string(),
  startingRoom: z.string(),
  startingGold: z.number().default(50),
  startingHealth: z.number().default(100),
  configId: z.string(),
  configName: z.string(),
  createdAt: z.string(),
  generatedBy: z.string(),
  worldBrief: WorldBriefSchema,
  settings: GenerationSettingsSchema,
  provider: ProviderConfigSchema,
  chapterIds: z.array(z.string()),
});

export type StoryManifest = z.infer<typeof StoryManifestSchema>;
