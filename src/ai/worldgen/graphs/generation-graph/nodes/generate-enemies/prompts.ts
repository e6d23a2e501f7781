import { fillTemplate } from "#worldsmith/ai/prompt-template-processor.js";
import { EnemySummary } from "#worldsmith/ai/worldgen/schemas.js";

export const ENEMY_TEMPLATE = `Generate a complete enemy JSON for: {enemyName}

=== ENEMY SUMMARY ===
Enemy ID: {enemyId}
Type: {enemyType}
Challenge Rating: {challengeRating}
Description: {description}
Chapter: {chapterNumber}

=== REQUIREMENTS ===
- 1-3 attacks with flavorful names
- damageMin must be at least 0 and no greater than damageMax
- dropChance values are between 0 and 1
- Loot item ids are snake_case

=== OUTPUT FORMAT ===
{
  "enemyId": "{enemyId}",
  "enemyName": "{enemyName}",
  "description": "<vivid description of appearance and behavior>",
  "enemyImage": "enemy_default",
  "maxHitPoints": {hitPoints},
  "currentHitPoints": {hitPoints},
  "armorClass": {armorClass},
  "experienceValue": {experience},
  "goldDrop": {gold},
  "attacks": [
    {
      "attackName": "<attack name>",
      "attackDescription": "<what the attack looks like>",
      "damageMin": <number>,
      "damageMax": {maxDamage},
      "hitBonus": {hitBonus}
    }
  ],
  "lootTable": [
    { "itemId": "<snake_case_item_id>", "dropChance": 0.25 }
  ]
}`;

/** Stat targets derived from challenge rating. */
export function enemyStats(challengeRating: number) {
  const cr = Math.max(1, Math.round(challengeRating));
  return {
    hitPoints: 20 + cr * 15,
    armorClass: 8 + cr,
    maxDamage: 5 + cr * 3,
    hitBonus: cr,
    experience: cr * 25,
    gold: cr * 10,
  };
}

export function buildEnemyPrompt(enemy: EnemySummary, chapterNumber: number): string {
  return fillTemplate(ENEMY_TEMPLATE, {
    enemyId: enemy.enemyId,
    enemyName: enemy.enemyName,
    enemyType: enemy.enemyType,
    challengeRating: enemy.challengeRating,
    description: enemy.description,
    chapterNumber,
    ...enemyStats(enemy.challengeRating),
  });
}
