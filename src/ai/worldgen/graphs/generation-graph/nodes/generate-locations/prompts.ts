import { fillTemplate } from "#worldsmith/ai/prompt-template-processor.js";
import { resolveNeighbors } from "#worldsmith/ai/worldgen/room-graph.js";
import {
  EnemySummary,
  NpcSummary,
  RoomGraph,
  RoomNode,
  RoomType,
} from "#worldsmith/ai/worldgen/schemas.js";

export interface RoomPromptContext {
  room: RoomNode;
  graph: RoomGraph;
  chapterNumber: number;
  chapterName: string;
  npcs: NpcSummary[];
  enemies: EnemySummary[];
}

const ROOM_DETAILS = `=== ROOM DETAILS ===
Room ID: {roomId}
Room Name: {roomName}
Brief Context: {description}
Chapter: {chapterNumber} - {chapterName}

=== VALID EXIT DESTINATIONS (use ONLY these room IDs) ===
{destinations}`;

export const CROSSROAD_ROOM_TEMPLATE = `Generate a CROSSROAD (navigation) room JSON for: {roomName}

=== THIS IS A NAVIGATION ROOM ===
- NO NPC dialogues
- NO combat
- Focus on atmospheric description and navigation options

{roomDetails}

=== REQUIREMENTS ===
- Rich atmospheric description (2-3 paragraphs)
- actions array must be EMPTY []
- dialogues array must be EMPTY []
- npcs array must be EMPTY []
- Exactly {exitCount} exits using ONLY the room IDs listed above

=== OUTPUT FORMAT ===
{
  "room_id": "{roomId}",
  "room_type": "crossroad",
  "description": "<rich atmospheric description with sensory details - what the player sees, hears, smells>",
  "npcs": [],
  "items": [],
  "actions": [],
  "dialogues": [],
  "exits": [
{exits}
  ],
  "combat": null,
  "events": []
}`;

export const INTERACTION_ROOM_TEMPLATE = `Generate an INTERACTION (NPC dialogue) room JSON for: {roomName}

!!! CRITICAL RULE - READ CAREFULLY !!!
action_id MUST EXACTLY EQUAL npc_name (case-sensitive)
Example:
  actions: [{ "action_id": "tavernkeeper_martha", ... }]
  dialogues: [{ "npc_name": "tavernkeeper_martha", ... }]

{roomDetails}

=== NPCs IN THIS ROOM (create dialogue for each) ===
{npcList}

=== REQUIREMENTS ===
- Rich atmospheric description (2-3 paragraphs)
- Exactly {npcCount} action(s), one per NPC
- EACH action_id MUST match a dialogue npc_name EXACTLY, and every npc_name must have an action
- Each dialogue should have 3-5 steps with branching responses
- next_step: -1 ends the conversation, 0+ continues at that step index
- Exactly {exitCount} exits using ONLY the room IDs listed above

=== OUTPUT FORMAT ===
{
  "room_id": "{roomId}",
  "room_type": "interaction",
  "description": "<rich atmospheric description>",
  "npcs": [{npcIds}],
  "items": [],
  "actions": [
{actions}
  ],
  "dialogues": [
{dialogues}
  ],
  "exits": [
{exits}
  ],
  "combat": null,
  "events": []
}`;

export const COMBAT_ROOM_TEMPLATE = `Generate a COMBAT (encounter) room JSON for: {roomName}

=== THIS IS A COMBAT ROOM ===
- Contains an enemy encounter
- May have treasure/loot after combat
- Usually 1-2 exits (back, and forward after victory)

{roomDetails}

=== ENEMY ===
{enemy}

=== REQUIREMENTS ===
- Tense atmospheric description hinting at danger
- actions array: empty or a simple 'Search area' after combat
- dialogues array: EMPTY []
- combat field must reference the enemy
- Exactly {exitCount} exits using ONLY the room IDs listed above

=== OUTPUT FORMAT ===
{
  "room_id": "{roomId}",
  "room_type": "combat",
  "description": "<tense atmospheric description - signs of danger, enemy presence>",
  "npcs": [],
  "items": [],
  "actions": [],
  "dialogues": [],
  "exits": [
{exits}
  ],
  "combat": {
    "enemyId": "{enemyId}",
    "isBoss": {isBoss},
    "defeatFlag": "{enemyId}_defeated"
  },
  "events": []
}`;

const DIALOGUE_STUB = `    {
      "npc_name": "{npcId}",
      "dialogue_image": "npc_default",
      "dialogues": [
        {
          "message": "<{personality} greeting>",
          "responses": [
            { "text": "<option 1>", "next_step": 1 },
            { "text": "<option 2>", "next_step": 2 },
            { "text": "Farewell.", "next_step": -1 }
          ]
        },
        {
          "message": "<response to option 1>",
          "responses": [
            { "text": "<continue>", "next_step": 3 },
            { "text": "Farewell.", "next_step": -1 }
          ]
        },
        {
          "message": "<response to option 2>",
          "responses": [
            { "text": "<continue>", "next_step": 3 },
            { "text": "Farewell.", "next_step": -1 }
          ]
        },
        {
          "message": "<deeper conversation>",
          "responses": [
            { "text": "<conclude>", "next_step": -1 }
          ]
        }
      ]
    }`;

function exitStubs(neighbors: RoomNode[], conditionsFor: (index: number) => string[] = () => []): string {
  return neighbors
    .map((target, i) =>
      [
        "    {",
        `      "exit_name": "<direction to ${target.roomName || target.roomId}>",`,
        `      "leads_to": "${target.roomId}",`,
        `      "conditions": ${JSON.stringify(conditionsFor(i))},`,
        `      "conditions_not": []`,
        "    }",
      ].join("\n")
    )
    .join(",\n");
}

function destinations(neighbors: RoomNode[]): string {
  return neighbors.length > 0
    ? neighbors.map((n) => `- ${n.roomId}: ${n.roomName}`).join("\n")
    : "- (none)";
}

function roomDetails(ctx: RoomPromptContext, neighbors: RoomNode[]): string {
  return fillTemplate(ROOM_DETAILS, {
    roomId: ctx.room.roomId,
    roomName: ctx.room.roomName,
    description: ctx.room.description,
    chapterNumber: ctx.chapterNumber,
    chapterName: ctx.chapterName,
    destinations: destinations(neighbors),
  });
}

export function buildCrossroadRoomPrompt(ctx: RoomPromptContext): string {
  const neighbors = resolveNeighbors(ctx.graph, ctx.room.roomId);
  return fillTemplate(CROSSROAD_ROOM_TEMPLATE, {
    roomId: ctx.room.roomId,
    roomName: ctx.room.roomName,
    roomDetails: roomDetails(ctx, neighbors),
    exitCount: neighbors.length,
    exits: exitStubs(neighbors),
  });
}

export function buildInteractionRoomPrompt(ctx: RoomPromptContext): string {
  const neighbors = resolveNeighbors(ctx.graph, ctx.room.roomId);
  const npcIds = ctx.room.npcs;
  const summaryFor = (npcId: string) => ctx.npcs.find((n) => n.npcId === npcId);

  const npcList = npcIds
    .map((npcId) => {
      const npc = summaryFor(npcId);
      return npc ? `- ${npc.npcId}: ${npc.npcName} (${npc.role}) - ${npc.personality}` : `- ${npcId}`;
    })
    .join("\n");

  const actions = npcIds
    .map((npcId) =>
      [
        "    {",
        `      "action_id": "${npcId}",`,
        `      "action_description": "Talk to ${summaryFor(npcId)?.npcName || npcId}"`,
        "    }",
      ].join("\n")
    )
    .join(",\n");

  const dialogues = npcIds
    .map((npcId) =>
      fillTemplate(DIALOGUE_STUB, {
        npcId,
        personality: summaryFor(npcId)?.personality || "mysterious",
      })
    )
    .join(",\n");

  return fillTemplate(INTERACTION_ROOM_TEMPLATE, {
    roomId: ctx.room.roomId,
    roomName: ctx.room.roomName,
    roomDetails: roomDetails(ctx, neighbors),
    npcList: npcList || "- (none)",
    npcCount: npcIds.length,
    npcIds: npcIds.map((id) => `"${id}"`).join(", "),
    actions,
    dialogues,
    exitCount: neighbors.length,
    exits: exitStubs(neighbors),
  });
}

export function buildCombatRoomPrompt(ctx: RoomPromptContext): string {
  const neighbors = resolveNeighbors(ctx.graph, ctx.room.roomId);
  const enemyId = ctx.room.enemyId ?? "";
  const enemy = ctx.enemies.find((e) => e.enemyId === enemyId);
  const enemyText = enemy
    ? `- ${enemy.enemyId}: ${enemy.enemyName} (CR ${enemy.challengeRating})\n- Description: ${enemy.description}`
    : `- ${enemyId}`;
  const defeatFlag = `${enemyId}_defeated`;

  return fillTemplate(COMBAT_ROOM_TEMPLATE, {
    roomId: ctx.room.roomId,
    roomName: ctx.room.roomName,
    roomDetails: roomDetails(ctx, neighbors),
    enemy: enemyText,
    enemyId,
    isBoss: String(ctx.graph.exitRoomId === ctx.room.roomId),
    exitCount: neighbors.length,
    // The first exit leads back; the rest open once the enemy is defeated.
    exits: exitStubs(neighbors, (i) => (i === 0 ? [] : [defeatFlag])),
  });
}

const BUILDERS: Record<RoomType, (ctx: RoomPromptContext) => string> = {
  crossroad: buildCrossroadRoomPrompt,
  interaction: buildInteractionRoomPrompt,
  combat: buildCombatRoomPrompt,
};

export function buildRoomPrompt(roomType: RoomType, ctx: RoomPromptContext): string {
  return BUILDERS[roomType](ctx);
}
