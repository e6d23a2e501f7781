import { fillTemplate } from "#worldsmith/ai/prompt-template-processor.js";
import {
  ChapterArtifact,
  GenerationSettings,
  LOCATION_TYPES,
  NPC_ROLES,
} from "#worldsmith/ai/worldgen/schemas.js";

export const OUTLINE_TEMPLATE = `Generate a detailed outline for Chapter {chapterNumber}.

=== CHAPTER REQUIREMENTS ===
- {locationCount} major locations
- {mainQuestCount} main quests (required for progression)
- {sideQuestCount} side quests (optional)
- Base difficulty: {baseDifficulty} (scale 1-10)
- Quest difficulty may vary by up to {variance} around the base
- {hardSideQuestRule}
- {enemyCount} enemy types (challengeRating between {minEnemyCR} and {maxEnemyCR})
- {npcCount} key NPCs

=== LOCATION DISTRIBUTION ===
- {hubCount} hub locations (always accessible: towns, shops)
- {questRevealCount} quest-revealed locations (discovered through quests)
- {gatedCount} progression-gated locations (require main quest completion)
{previousChapter}
=== RULES ===
- locationType must be one of: {locationTypes}
- role must be one of: {npcRoles}
- Every id must be unique and snake_case
- Every quest taskLocation and NPC locationId must be one of your locationIds
- hubLocationId, entryLocationId and exitLocationId must be locationIds

=== OUTPUT FORMAT ===
{
  "chapterId": "chapter_{chapterNumber}",
  "chapterName": "<evocative chapter name>",
  "chapterDescription": "<2-3 sentence summary>",
  "chapterIntro": "<opening narration when chapter starts>",
  "hubLocationId": "<main_hub_id>",
  "entryLocationId": "<entry_from_previous_chapter>",
  "exitLocationId": "<exit_to_next_chapter>",
  "locations": [
    {
      "locationId": "<snake_case_id>",
      "locationName": "<display name>",
      "locationType": "{locationTypesPiped}",
      "description": "<brief description>",
      "alwaysVisible": true|false,
      "connectedTo": ["<other_location_ids>"]
    }
  ],
  "mainQuests": [
    {
      "questId": "<snake_case_id>",
      "questName": "<quest name>",
      "description": "<quest summary>",
      "questGiver": "<npc_id>",
      "taskLocation": "<location_id>",
      "difficulty": <1-10>
    }
  ],
  "sideQuests": [<same format as mainQuests>],
  "keyNPCs": [
    {
      "npcId": "<snake_case_id>",
      "npcName": "<display name>",
      "role": "{npcRolesPiped}",
      "personality": "<brief personality>",
      "locationId": "<where they are found>"
    }
  ],
  "enemies": [
    {
      "enemyId": "<snake_case_id>",
      "enemyName": "<display name>",
      "enemyType": "<creature type>",
      "challengeRating": <1-10>,
      "description": "<brief description>"
    }
  ]
}`;

const PREVIOUS_CHAPTER_TEMPLATE = `
=== PREVIOUS CHAPTER CONTEXT ===
Previous Chapter: {chapterName}
Summary: {chapterDescription}
Exit Location: {exitLocationId}
The new chapter should continue naturally from this point.
`;

export interface OutlinePromptContext {
  chapterNumber: number;
  settings: GenerationSettings;
  previousChapter?: ChapterArtifact | null;
}

/** Difficulty band for a chapter ordinal. */
export function chapterDifficulty(chapterNumber: number) {
  return {
    baseDifficulty: chapterNumber * 2,
    minEnemyCR: Math.max(1, chapterNumber - 1),
    maxEnemyCR: chapterNumber + 2,
  };
}

/** Hub / quest-revealed / gated split of the chapter's locations. */
export function locationDistribution(settings: GenerationSettings) {
  const hubCount = Math.floor(settings.locationsPerChapter * settings.hubLocationRatio);
  const questRevealCount = Math.floor(settings.locationsPerChapter * settings.questRevealedRatio);
  const gatedCount = Math.max(0, settings.locationsPerChapter - hubCount - questRevealCount);
  return { hubCount, questRevealCount, gatedCount };
}

export function buildOutlinePrompt({ chapterNumber, settings, previousChapter }: OutlinePromptContext): string {
  const { baseDifficulty, minEnemyCR, maxEnemyCR } = chapterDifficulty(chapterNumber);
  const { hubCount, questRevealCount, gatedCount } = locationDistribution(settings);
  const variance = Math.round(settings.difficultyVariance * baseDifficulty);

  const hardSideQuestRule = settings.allowHardSideQuests
    ? `About ${settings.hardSideQuestChance}% of side quests may be harder than the base difficulty`
    : "Side quests must not be harder than the base difficulty";

  const previous = previousChapter
    ? fillTemplate(PREVIOUS_CHAPTER_TEMPLATE, {
        chapterName: previousChapter.chapterName,
        chapterDescription: previousChapter.chapterDescription,
        exitLocationId: previousChapter.exitLocationId,
      })
    : "";

  return fillTemplate(OUTLINE_TEMPLATE, {
    chapterNumber,
    locationCount: settings.locationsPerChapter,
    mainQuestCount: settings.mainQuestsPerChapter,
    sideQuestCount: Math.max(0, settings.questsPerChapter - settings.mainQuestsPerChapter),
    baseDifficulty,
    variance,
    hardSideQuestRule,
    enemyCount: settings.enemyTypesPerChapter,
    minEnemyCR,
    maxEnemyCR,
    npcCount: settings.npcsPerChapter,
    hubCount,
    questRevealCount,
    gatedCount,
    previousChapter: previous,
    locationTypes: LOCATION_TYPES.join(", "),
    locationTypesPiped: LOCATION_TYPES.join("|"),
    npcRoles: NPC_ROLES.join(", "),
    npcRolesPiped: NPC_ROLES.join("|"),
  });
}
