import { describe, expect, it } from "@jest/globals";
import { EnemySummarySchema } from "#worldsmith/ai/worldgen/schemas.js";
import { buildEnemyPrompt, enemyStats } from "../prompts.js";

describe("enemyStats", () => {
  it("scales targets with the rounded challenge rating", () => {
    expect(enemyStats(2.4)).toEqual({
      hitPoints: 50,
      armorClass: 10,
      maxDamage: 11,
      hitBonus: 2,
      experience: 50,
      gold: 20,
    });
  });

  it("treats ratings below 1 as 1", () => {
    expect(enemyStats(0)).toEqual(enemyStats(1));
    expect(enemyStats(0).hitPoints).toBe(35);
  });
});

describe("buildEnemyPrompt", () => {
  it("fills the summary and chapter", () => {
    const enemy = EnemySummarySchema.parse({
      enemyId: "ghoul",
      enemyName: "Ghoul",
      enemyType: "undead",
      challengeRating: 3,
      description: "A hungry corpse.",
    });
    const prompt = buildEnemyPrompt(enemy, 2);

    expect(prompt.split("\n").slice(0, 8)).toEqual([
      "Generate a complete enemy JSON for: Ghoul",
      "",
      "=== ENEMY SUMMARY ===",
      "Enemy ID: ghoul",
      "Type: undead",
      "Challenge Rating: 3",
      "Description: A hungry corpse.",
      "Chapter: 2",
    ]);
  });
});
