import { fillTemplate } from "#worldsmith/ai/prompt-template-processor.js";
import {
  ChapterOutline,
  OBJECTIVE_TYPES,
  QuestSummary,
} from "#worldsmith/ai/worldgen/schemas.js";

export const QUEST_TEMPLATE = `Generate a complete quest JSON for: {questName}

=== QUEST SUMMARY ===
Quest ID: {questId}
Quest Type: {questType}
Chapter: {chapterNumber} - {chapterName}
Description: {description}
Quest Giver: {questGiver}
Task Location: {taskLocation}
Difficulty: {difficulty}

=== VALID ROOM IDs (targets for GoToRoom, questGiverLocation, reveals) ===
{roomIds}

=== VALID NPC IDs (targets for TalkToNPC, questGiver) ===
{npcIds}

=== VALID ENEMY IDs (targets for DefeatEnemy, DefeatCount) ===
{enemyIds}

=== ALLOWED PREREQUISITE QUESTS ===
{prerequisites}

=== OBJECTIVE TYPES ===
{objectiveTypes}

=== REQUIREMENTS ===
- 2-4 objectives that tell a small story
- Every targetId must come from the lists above; CollectItem, DeliverItem and UseItem targets are new snake_case item ids
- A quest must never list itself as a prerequisite
- Rewards should scale with difficulty (about {rewardExp} experience and {rewardGold} gold)

=== OUTPUT FORMAT ===
{
  "questId": "{questId}",
  "questName": "{questName}",
  "questDescription": "<full quest description>",
  "questGiver": "{questGiver}",
  "questGiverLocation": "<room_id where the giver is found>",
  "questType": "{questType}",
  "chapterNumber": {chapterNumber},
  "difficulty": {difficulty},
  "prerequisiteQuests": [],
  "prerequisiteFlags": [],
  "objectives": [
    {
      "objectiveId": "<snake_case_id>",
      "description": "<what the player must do>",
      "type": "{objectiveTypesPiped}",
      "targetId": "<target id>",
      "targetCount": 1,
      "isOptional": false
    }
  ],
  "revealsOnAccept": ["<room_ids revealed when accepted>"],
  "revealsOnComplete": ["<room_ids revealed when completed>"],
  "rewards": {
    "experiencePoints": {rewardExp},
    "gold": {rewardGold},
    "itemIds": [],
    "flagsToSet": [{ "flagName": "{questId}_complete", "flagValue": "true" }]
  },
  "state": "NotStarted"
}`;

export interface QuestPromptContext {
  quest: QuestSummary;
  isMain: boolean;
  chapterNumber: number;
  outline: ChapterOutline;
  roomIds: string[];
  /** Quests generated before this one, in this and earlier chapters. */
  priorQuestIds: string[];
}

const bullets = (values: string[]) => (values.length > 0 ? values.map((v) => `- ${v}`).join("\n") : "- (none)");

export function buildQuestPrompt(ctx: QuestPromptContext): string {
  const { quest, outline } = ctx;
  const difficulty = Math.max(1, Math.round(quest.difficulty));
  return fillTemplate(QUEST_TEMPLATE, {
    questId: quest.questId,
    questName: quest.questName,
    questType: ctx.isMain ? "Main" : "Side",
    chapterNumber: ctx.chapterNumber,
    chapterName: outline.chapterName,
    description: quest.description,
    questGiver: quest.questGiver,
    taskLocation: quest.taskLocation,
    difficulty,
    roomIds: bullets(ctx.roomIds),
    npcIds: bullets(outline.keyNPCs.map((n) => n.npcId)),
    enemyIds: bullets(outline.enemies.map((e) => e.enemyId)),
    prerequisites: bullets(ctx.priorQuestIds.filter((id) => id !== quest.questId)),
    objectiveTypes: OBJECTIVE_TYPES.join(", "),
    objectiveTypesPiped: OBJECTIVE_TYPES.join("|"),
    rewardExp: difficulty * 50,
    rewardGold: difficulty * 20,
  });
}
