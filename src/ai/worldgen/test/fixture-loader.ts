/**
 * Fixture loader utilities for world generation tests
 *
 * A world fixture holds a generation config plus the reply the model would
 * give for every artifact of every chapter, so the whole pipeline can run
 * without a provider.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { WorldGenerationConfigSchema } from "#worldsmith/ai/worldgen/schemas.js";
import { JsonObject } from "#worldsmith/ai/worldgen/validators.js";
import { Responder, ScriptedReply } from "./scripted-chat-model.js";

const documents = z.record(z.record(z.unknown()));

const ChapterRepliesSchema = z.object({
  outline: z.record(z.unknown()),
  graph: z.record(z.unknown()),
  rooms: documents,
  quests: documents,
  enemies: documents,
  items: documents,
});

const WorldFixtureSchema = z.object({
  metadata: z.object({ world: z.string(), description: z.string() }),
  config: WorldGenerationConfigSchema,
  chapters: z.record(ChapterRepliesSchema),
});

export type ChapterReplies = z.infer<typeof ChapterRepliesSchema>;
export type WorldFixture = z.infer<typeof WorldFixtureSchema>;

/**
 * Load a world fixture by name
 *
 * @example
 * const fixture = await loadWorldFixture('ashen-road');
 * expect(fixture.config.worldBrief.worldName).toBe('Emberfall');
 */
export async function loadWorldFixture(worldName: string): Promise<WorldFixture> {
  const fixturePath = path.join(
    process.cwd(),
    "src",
    "ai",
    "worldgen",
    "test",
    "fixtures",
    "worlds",
    worldName,
    "replies.json"
  );

  const content = await fs.readFile(fixturePath, "utf-8");
  const result = WorldFixtureSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    throw new Error(`Invalid fixture structure in ${fixturePath}: ${result.error.message}`);
  }
  return result.data;
}

const OUTLINE_RE = /Generate a detailed outline for Chapter (\d+)/;
const GRAPH_RE = /Generate a room connectivity graph/;
const ARTIFACT_RES: Array<[keyof Omit<ChapterReplies, "outline" | "graph">, RegExp]> = [
  ["rooms", /^Room ID: (\S+)/m],
  ["quests", /^Quest ID: (\S+)/m],
  ["enemies", /^Enemy ID: (\S+)/m],
  ["items", /item id: (\S+)/],
];

/**
 * Answers each prompt with the fixture document it asks for. Overrides are
 * keyed by artifact id, or by "outline:<n>" / "graph:<n>" for a chapter's
 * outline and room graph, and win over the fixture.
 */
export function fixtureResponder(
  fixture: WorldFixture,
  overrides: Record<string, ScriptedReply> = {}
): Responder {
  let chapter = "1";

  const reply = (key: string, document: JsonObject | undefined): ScriptedReply => {
    const override = overrides[key];
    if (override !== undefined) return override;
    return document ? JSON.stringify(document) : new Error(`No fixture reply for ${key}`);
  };

  return (prompt) => {
    const outline = OUTLINE_RE.exec(prompt);
    if (outline) {
      chapter = outline[1];
      return reply(`outline:${chapter}`, fixture.chapters[chapter]?.outline);
    }
    if (GRAPH_RE.test(prompt)) {
      return reply(`graph:${chapter}`, fixture.chapters[chapter]?.graph);
    }
    for (const [kind, re] of ARTIFACT_RES) {
      const match = re.exec(prompt);
      if (match) {
        const id = match[1];
        return reply(id, fixture.chapters[chapter]?.[kind][id]);
      }
    }
    return new Error(`Unrecognised prompt: ${prompt.slice(0, 60)}`);
  };
}
