import { describe, expect, it } from "@jest/globals";
import {
  parseJsonDocument,
  validateArtifact,
  validateArtifactDocument,
} from "../validators.js";

const json = (value: unknown) => JSON.stringify(value);

const exit = (leads_to: string, exit_name = "Onward") => ({ exit_name, leads_to, conditions: [], conditions_not: [] });

const talkingRoom = (actionId: string, speakerId: string) => ({
  room_id: "ch1_square",
  room_type: "interaction",
  description: "A square.",
  npcs: [actionId],
  actions: [{ action_id: actionId, action_description: "Talk" }],
  dialogues: [
    {
      npc_name: speakerId,
      dialogues: [{ message: "Hello.", responses: [{ text: "Bye.", next_step: -1 }] }],
    },
  ],
  exits: [exit("ch1_gate")],
});

describe("parseJsonDocument", () => {
  it("rejects empty text", () => {
    expect(parseJsonDocument("  ")).toEqual({ ok: false, errors: ["JSON is empty"] });
  });

  it("rejects a non-object root", () => {
    expect(parseJsonDocument("[1, 2]")).toEqual({ ok: false, errors: ["JSON root must be an object"] });
  });

  it("accepts fenced JSON", () => {
    expect(parseJsonDocument('```json\n{"a": 1}\n```')).toEqual({ ok: true, document: { a: 1 } });
  });
});

describe("validateArtifact", () => {
  it("reports prose as a parse failure", () => {
    const result = validateArtifact("room", "The crypt is dark.");

    expect(result.document).toBeUndefined();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith("JSON parse error:")).toBe(true);
    expect(result.parsed).toBeUndefined();
  });

  it("keeps the document when the schema does not match", () => {
    const result = validateArtifact("room", json({ room_id: 5 }));

    expect(result.errors).toEqual(["room_id: Expected string, received number"]);
    expect(result.document).toEqual({ room_id: 5 });
    expect(result.parsed).toBeUndefined();
  });

  describe("rooms", () => {
    it("accepts a clean crossroad room", () => {
      const room = { room_id: "ch1_gate", room_type: "crossroad", description: "A gate.", exits: [exit("ch1_square")] };
      const result = validateArtifact("room", json(room), { knownRoomIds: new Set(["ch1_gate", "ch1_square"]) });

      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.parsed?.room_id).toBe("ch1_gate");
    });

    it("forbids actions in a crossroad room", () => {
      const room = {
        room_id: "ch1_gate",
        room_type: "crossroad",
        description: "A gate.",
        actions: [{ action_id: "npc_a", action_description: "Talk" }],
        exits: [exit("ch1_square")],
      };

      expect(validateArtifact("room", json(room)).errors).toEqual(["Crossroad room must not have actions"]);
    });

    it("requires actions and dialogues to pair up in an interaction room", () => {
      const result = validateArtifact("room", json(talkingRoom("npc_a", "npc_b")));

      expect(result.errors).toEqual([
        "action_id 'npc_a' has no matching dialogue npc_name",
        "dialogue npc_name 'npc_b' has no matching action_id",
      ]);
      expect(result.warnings).toEqual([]);
    });

    it("resolves exits against the known room ids", () => {
      const room = { room_id: "ch1_gate", room_type: "crossroad", description: "A gate.", exits: [exit("ch1_nowhere", "North")] };
      const result = validateArtifact("room", json(room), { knownRoomIds: new Set(["ch1_gate"]) });

      expect(result.errors).toEqual(["Exit 'North' leads to unknown room: 'ch1_nowhere'"]);
    });

    it("checks the planned room type and combat enemy", () => {
      const room = { room_id: "ch1_crypt", room_type: "combat", description: "A crypt.", exits: [exit("ch1_square")] };
      const result = validateArtifact("room", json(room), { expectedRoomType: "crossroad" });

      expect(result.errors).toEqual([
        "room_type 'combat' does not match planned type 'crossroad'",
        "Combat room must reference an enemy in combat.enemyId",
      ]);
    });

    it("rejects dialogue jumps past the last step", () => {
      const room = talkingRoom("npc_a", "npc_a");
      room.dialogues[0].dialogues[0].responses[0].next_step = 3;

      expect(validateArtifact("room", json(room)).errors).toEqual(["Invalid next_step 3 in dialogue 'npc_a' (max: 0)"]);
    });

    it("warns about a room with no exits", () => {
      const result = validateArtifact("room", json({ room_id: "ch1_gate", room_type: "crossroad", description: "A gate." }));

      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual(["Room has no exits defined"]);
    });
  });

  describe("quests", () => {
    it("flags objective types, self prerequisites and missing rewards", () => {
      const quest = {
        questId: "q_a",
        questName: "A",
        questType: "Main",
        difficulty: 2,
        prerequisiteQuests: ["q_a"],
        objectives: [{ objectiveId: "o1", description: "Look around", type: "Explore", targetId: "ch1_gate" }],
      };
      const result = validateArtifact("quest", json(quest));

      expect(result.errors).toEqual([
        "Objective 0 has invalid type: 'Explore' (expected: GoToRoom, TalkToNPC, CollectItem, DeliverItem, DefeatEnemy, DefeatCount, SetFlag, UseItem, Custom)",
        "Quest 'q_a' lists itself as a prerequisite",
      ]);
      expect(result.warnings).toEqual(["Quest has no rewards defined"]);
    });

    it("requires a known quest type, a difficulty in range and an objective", () => {
      const result = validateArtifact("quest", json({ questId: "q_b", questName: "B", questType: "Epic", difficulty: 12 }));

      expect(result.errors).toEqual([
        "questType must be Main or Side, got 'Epic'",
        "difficulty must be between 1 and 10, got 12",
        "At least one objective is required",
      ]);
    });
  });

  it("checks enemy attacks and loot chances", () => {
    const enemy = {
      enemyId: "ghoul",
      enemyName: "Ghoul",
      maxHitPoints: 30,
      attacks: [{ attackName: "Claw", damageMin: 6, damageMax: 2 }],
      lootTable: [{ itemId: "bone", dropChance: 1.5 }],
    };

    expect(validateArtifact("enemy", json(enemy)).errors).toEqual([
      "Attack 'Claw' has damageMax < damageMin",
      "Loot 'bone' dropChance must be between 0 and 1",
    ]);
  });

  it("checks item effect and target ranges", () => {
    const item = { itemId: "potion", shortDescription: "Potion", effectType: 7, target: 4 };

    expect(validateArtifact("item", json(item)).errors).toEqual([
      "effectType must be between 0 and 4, got 7",
      "target must be between 0 and 3, got 4",
    ]);
  });

  it("reports duplicate outline locations", () => {
    const outline = {
      chapterId: "chapter_1",
      chapterName: "One",
      locations: [{ locationId: "ch1_a" }, { locationId: "ch1_a" }],
      mainQuests: [{ questId: "q_a", taskLocation: "ch1_b" }],
    };
    const result = validateArtifact("outline", json(outline));

    expect(result.errors).toEqual(["Duplicate location ID: ch1_a"]);
    expect(result.warnings).toEqual(["Quest 'q_a' references unknown location: ch1_b"]);
  });

  it("reports one-way graph connections and dangling hub ids", () => {
    const graph = {
      chapterId: "chapter_1",
      hubRoomId: "ch1_hub",
      entryRoomId: "ch1_a",
      exitRoomId: "ch1_b",
      rooms: [
        { roomId: "ch1_a", roomName: "A", roomType: "crossroad", connectsTo: ["ch1_b"] },
        { roomId: "ch1_b", roomName: "B", roomType: "crossroad", connectsTo: ["ch1_c"] },
      ],
    };
    const result = validateArtifactDocument("graph", graph);

    expect(result.errors).toEqual([
      "hubRoomId 'ch1_hub' not found in room list",
      "Room 'ch1_b' connects to non-existent room 'ch1_c'",
      "Connection ch1_a -> ch1_b is not bidirectional",
    ]);
  });
});
