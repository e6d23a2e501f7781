import { describe, expect, it } from "@jest/globals";
import { collectItemReferences } from "../index.js";
import { buildItemPrompt } from "../prompts.js";

const quest = {
  questId: "q_a",
  questName: "Quest A",
  objectives: [
    { objectiveId: "o1", type: "CollectItem", targetId: "rusty_key" },
    { objectiveId: "o2", type: "DefeatEnemy", targetId: "ghoul" },
    { objectiveId: "o3", type: "UseItem", targetId: "" },
  ],
  rewards: { itemIds: ["silver_ring", "rusty_key"] },
};

const enemy = {
  enemyId: "ghoul",
  enemyName: "Ghoul",
  lootTable: [{ itemId: "bone_charm", dropChance: 0.5 }],
};

describe("collectItemReferences", () => {
  it("collects ids in first-seen order with usage notes", () => {
    const references = collectItemReferences([quest], [enemy]);

    expect([...references.keys()]).toEqual(["rusty_key", "silver_ring", "bone_charm"]);
    expect(references.get("rusty_key")).toEqual([
      "CollectItem objective of quest q_a",
      "reward of quest q_a",
    ]);
    expect(references.get("bone_charm")).toEqual(["loot dropped by Ghoul"]);
  });

  it("skips documents that do not match their schema", () => {
    const broken = { questId: "q_b", objectives: "none" };
    expect(collectItemReferences([broken], []).size).toBe(0);
  });

  it("names the enemy by id when it has no name", () => {
    const references = collectItemReferences([], [{ enemyId: "wisp", lootTable: [{ itemId: "glow_dust" }] }]);
    expect(references.get("glow_dust")).toEqual(["loot dropped by wisp"]);
  });
});

describe("buildItemPrompt", () => {
  it("prices items by chapter", () => {
    const prompt = buildItemPrompt({
      itemId: "rusty_key",
      chapterNumber: 3,
      chapterName: "The Sunken Gate",
      usage: ["CollectItem objective of quest q_a", "reward of quest q_a"],
    });

    expect(prompt).toContain("Chapter: 3 - The Sunken Gate\nReferenced by: CollectItem objective of quest q_a; reward of quest q_a\n");
    expect(prompt).toContain('  "buyPrice": 75,\n  "sellPrice": 37,');
    expect(prompt).toContain('- itemId must stay exactly "rusty_key"');
  });

  it("describes unreferenced items as general loot", () => {
    const prompt = buildItemPrompt({ itemId: "coin", chapterNumber: 1, chapterName: "Start", usage: [] });
    expect(prompt).toContain("Referenced by: general loot\n");
  });
});
