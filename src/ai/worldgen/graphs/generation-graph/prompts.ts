import { fillTemplate } from "#worldsmith/ai/prompt-template-processor.js";
import { WorldBrief } from "#worldsmith/ai/worldgen/schemas.js";

/**
 * Shared system prompt. The world context is identical for every request in
 * a run, so it sits in a cache section.
 */
export const SYSTEM_PROMPT_TEMPLATE = `!___ CACHE:world-context ___!
You are a world-building assistant for a text adventure game.
Your task is to generate game content in valid JSON format.

=== WORLD CONTEXT ===
World Name: {worldName}
Theme: {theme}
Tone: {tone}
Era: {era}
Setting: {settingDescription}
Key Locations: {keyLocations}
Major Factions: {majorFactions}
Main Conflict: {mainConflict}
Player Role: {protagonistRole}
Narrative Themes: {narrativeThemes}
Writing Style: {writingStyle}
Dialogue Tone: {dialogueTone}{customParameters}

=== CRITICAL RULES ===
1. Output ONLY valid JSON - no markdown, no explanations, no code blocks
2. Use snake_case for all IDs (e.g., 'haunted_mill', 'guard_captain')
3. Descriptions should be atmospheric and match the tone
4. NPC dialogue must reflect personality and world lore
5. All location/quest/NPC references must use consistent IDs
6. Combat encounters must match specified difficulty level
!___ END-CACHE ___!`;

const list = (values: string[]) => (values.length > 0 ? values.join(", ") : "(none)");

export function buildSystemPrompt(brief: WorldBrief): string {
  const customParameters = brief.customParameters
    .map((p) => `\n${p.key}: ${p.value}`)
    .join("");

  return fillTemplate(SYSTEM_PROMPT_TEMPLATE, {
    worldName: brief.worldName,
    theme: brief.theme,
    tone: brief.tone,
    era: brief.era,
    settingDescription: brief.settingDescription,
    keyLocations: list(brief.keyLocations),
    majorFactions: list(brief.majorFactions),
    mainConflict: brief.mainConflict,
    protagonistRole: brief.protagonistRole,
    narrativeThemes: list(brief.narrativeThemes),
    writingStyle: brief.writingStyle,
    dialogueTone: brief.dialogueTone,
    customParameters,
  });
}
