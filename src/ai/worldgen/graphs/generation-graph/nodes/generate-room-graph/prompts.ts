import { fillTemplate } from "#worldsmith/ai/prompt-template-processor.js";
import {
  ChapterOutline,
  GenerationSettings,
  MAX_EXITS_BY_ROOM_TYPE,
  ROOM_TYPES,
} from "#worldsmith/ai/worldgen/schemas.js";

export const ROOM_GRAPH_TEMPLATE = `Generate a room connectivity graph for chapter: {chapterName}

=== CHAPTER LOCATIONS ===
{locations}

=== KEY NPCs ===
{npcs}

=== ENEMIES ===
{enemies}

=== ROOM TYPE DEFINITIONS ===
1. 'crossroad' - Navigation hub with 2-{crossroadMax} exits. NO NPC dialogues, NO combat.
2. 'interaction' - NPC dialogue room with 1-{interactionMax} exits. Contains NPCs to talk to.
3. 'combat' - Combat encounter room with 1-{combatMax} exits. Contains one enemy.

=== REQUIREMENTS ===
- Create about {roomCount} rooms in total
- Every location must have at least one room; a major location may be split into up to {subLocations} sub-rooms
- Hub locations should have mostly crossroad rooms
- Each NPC needs an interaction room where they can be found; use only the NPC ids listed above
- Each combat room must set enemyId to one of the enemy ids listed above
- All connections must be bidirectional (if A connects to B, B must connect to A)
- hubRoomId, entryRoomId and exitRoomId must be roomIds from your list
- Use snake_case for all room IDs
- Room IDs should follow pattern: locationId_descriptiveName (e.g., 'town_square_fountain', 'tavern_interior')

=== OUTPUT FORMAT ===
{
  "chapterId": "{chapterId}",
  "hubRoomId": "<main_hub_room_id>",
  "entryRoomId": "<entry_point_room_id>",
  "exitRoomId": "<exit_to_next_chapter_room_id>",
  "rooms": [
    {
      "roomId": "<snake_case_room_id>",
      "roomName": "<Display Name>",
      "roomType": "{roomTypes}",
      "description": "<brief 1-sentence description for context>",
      "connectsTo": ["<other_room_ids>"],
      "npcs": ["<npc_ids_in_this_room>"],
      "enemyId": "<enemy_id_or_null>",
      "isHub": true|false
    }
  ]
}`;

const bulletList = (lines: string[]) => (lines.length > 0 ? lines.join("\n") : "- (none)");

export function buildRoomGraphPrompt(outline: ChapterOutline, settings: GenerationSettings): string {
  return fillTemplate(ROOM_GRAPH_TEMPLATE, {
    chapterName: outline.chapterName,
    chapterId: outline.chapterId,
    locations: bulletList(
      outline.locations.map((l) => `- ${l.locationId}: ${l.locationName} (${l.locationType})`)
    ),
    npcs: bulletList(
      outline.keyNPCs.map((n) => `- ${n.npcId}: ${n.npcName} (${n.role}) at ${n.locationId}`)
    ),
    enemies: bulletList(
      outline.enemies.map((e) => `- ${e.enemyId}: ${e.enemyName} (CR ${e.challengeRating})`)
    ),
    crossroadMax: MAX_EXITS_BY_ROOM_TYPE.crossroad,
    interactionMax: MAX_EXITS_BY_ROOM_TYPE.interaction,
    combatMax: MAX_EXITS_BY_ROOM_TYPE.combat,
    roomCount: settings.locationsPerChapter,
    subLocations: settings.subLocationsPerMajor,
    roomTypes: ROOM_TYPES.join("|"),
  });
}
