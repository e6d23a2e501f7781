import { fillTemplate } from "#worldsmith/ai/prompt-template-processor.js";
import { ITEM_CATEGORIES } from "#worldsmith/ai/worldgen/schemas.js";

export const ITEM_TEMPLATE = `Generate a complete item JSON for item id: {itemId}

=== CONTEXT ===
Chapter: {chapterNumber} - {chapterName}
Referenced by: {usage}

=== EFFECT TYPES ===
0 = None, 1 = Heal, 2 = Damage, 3 = Buff, 4 = Unlock

=== TARGETS ===
0 = Self, 1 = Enemy, 2 = Ally, 3 = Object

=== REQUIREMENTS ===
- itemId must stay exactly "{itemId}"
- category must be one of: {categories}
- If stacking is true, maxStack must be greater than 0
- sellPrice is about half of buyPrice

=== OUTPUT FORMAT ===
{
  "itemId": "{itemId}",
  "shortDescription": "<display name>",
  "description": "<flavorful description>",
  "usageSuccess": "<message when used successfully>",
  "usageFail": "<message when use fails>",
  "category": "{categoriesPiped}",
  "effectType": <0-4>,
  "effectAmount": <number>,
  "target": <0-3>,
  "stacking": true|false,
  "maxStack": <number>,
  "buyPrice": {buyPrice},
  "sellPrice": {sellPrice},
  "image": "item_default",
  "combatUsable": true|false
}`;

export interface ItemPromptContext {
  itemId: string;
  chapterNumber: number;
  chapterName: string;
  /** Human-readable notes on where the item is referenced. */
  usage: string[];
}

export function buildItemPrompt(ctx: ItemPromptContext): string {
  const buyPrice = 25 * ctx.chapterNumber;
  return fillTemplate(ITEM_TEMPLATE, {
    itemId: ctx.itemId,
    chapterNumber: ctx.chapterNumber,
    chapterName: ctx.chapterName,
    usage: ctx.usage.length > 0 ? ctx.usage.join("; ") : "general loot",
    categories: ITEM_CATEGORIES.join(", "),
    categoriesPiped: ITEM_CATEGORIES.join("|"),
    buyPrice,
    sellPrice: Math.floor(buyPrice / 2),
  });
}
