import { beforeAll, describe, expect, it } from "@jest/globals";
import { ChapterArtifact, StoryManifest, WorldGenerationConfig } from "#worldsmith/ai/worldgen/schemas.js";
import { loadWorldFixture } from "#worldsmith/ai/worldgen/test/fixture-loader.js";
import { DEFAULT_STORY_DESCRIPTION, buildStoryManifest } from "../index.js";

const createdAt = new Date("2026-01-01T00:00:00.000Z");

function chapter(chapterId: string, hubLocationId: string, locationIds: string[]): ChapterArtifact {
  return {
    chapterId,
    chapterName: chapterId,
    chapterNumber: Number(chapterId.split("_")[1]),
    chapterDescription: "",
    chapterIntro: "",
    unlockQuestId: null,
    completionQuestId: null,
    unlockFlags: [],
    baseDifficulty: 2,
    minEnemyCR: 1,
    maxEnemyCR: 3,
    locationIds,
    questIds: [],
    mainQuestIds: [],
    enemyIds: [],
    itemIds: [],
    npcIds: [],
    mapId: `${chapterId}_map`,
    hubLocationId,
    entryLocationId: "",
    exitLocationId: "",
    generatedAt: createdAt.toISOString(),
    isGenerated: true,
  };
}

describe("buildStoryManifest", () => {
  let config: WorldGenerationConfig;

  beforeAll(async () => {
    config = (await loadWorldFixture("ashen-road")).config;
  });

  it("builds a new manifest from the config", () => {
    const manifest = buildStoryManifest({
      config,
      storyId: "ashen_road",
      chapters: [chapter("chapter_1", "ch1_square", ["ch1_gate", "ch1_square"])],
      createdAt,
    });

    expect(manifest).toMatchObject({
      storyId: "ashen_road",
      storyName: "Emberfall",
      storyDescription: DEFAULT_STORY_DESCRIPTION,
      startingRoom: "ch1_square",
      startingGold: 50,
      startingHealth: 100,
      configId: "ashen_road",
      configName: "Ashen Road",
      createdAt: "2026-01-01T00:00:00.000Z",
      generatedBy: "worldsmith (openai/test-model)",
      chapterIds: ["chapter_1"],
    });
  });

  it("starts in the first location when the first chapter has no hub", () => {
    const manifest = buildStoryManifest({
      config,
      storyId: "ashen_road",
      chapters: [chapter("chapter_1", "", ["ch1_gate"])],
      createdAt,
    });
    expect(manifest.startingRoom).toBe("ch1_gate");
  });

  it("keeps the identity of an existing story", () => {
    const first = buildStoryManifest({
      config,
      storyId: "ashen_road",
      chapters: [chapter("chapter_1", "ch1_square", ["ch1_square"])],
      createdAt,
    });
    const existing: StoryManifest = {
      ...first,
      storyName: "The Ashen Road",
      storyDescription: "Smoke and bone.",
      startingGold: 80,
      configId: "cfg_original",
    };

    const manifest = buildStoryManifest({
      config,
      storyId: "ashen_road",
      chapters: [
        chapter("chapter_1", "ch1_square", ["ch1_square"]),
        chapter("chapter_2", "ch2_docks", ["ch2_docks"]),
      ],
      createdAt: new Date("2026-02-01T00:00:00.000Z"),
      existing,
    });

    expect(manifest.storyName).toBe("The Ashen Road");
    expect(manifest.storyDescription).toBe("Smoke and bone.");
    expect(manifest.startingGold).toBe(80);
    expect(manifest.configId).toBe("cfg_original");
    expect(manifest.createdAt).toBe("2026-01-01T00:00:00.000Z");
    expect(manifest.startingRoom).toBe("ch1_square");
    expect(manifest.chapterIds).toEqual(["chapter_1", "chapter_2"]);
  });
});
