import { beforeAll, describe, expect, it } from "@jest/globals";
import { ChapterOutlineSchema, RoomGraphSchema } from "#worldsmith/ai/worldgen/schemas.js";
import { WorldFixture, loadWorldFixture } from "#worldsmith/ai/worldgen/test/fixture-loader.js";
import { GenerationStateType } from "../../../generation-state.js";
import { buildChapterArtifact } from "../index.js";

const generatedAt = new Date("2026-01-01T00:00:00.000Z");

function chapterState(fixture: WorldFixture, chapterNumber: number): GenerationStateType {
  const replies = fixture.chapters[String(chapterNumber)];
  const outline = ChapterOutlineSchema.parse(replies.outline);
  return {
    chapterNumber,
    lastChapterNumber: chapterNumber,
    outline,
    roomGraph: RoomGraphSchema.parse(replies.graph),
    chapterQuestIds: Object.keys(replies.quests),
    chapterMainQuestIds: outline.mainQuests.map((q) => q.questId),
    chapterEnemyIds: Object.keys(replies.enemies),
    chapterItemIds: Object.keys(replies.items),
    chapters: [],
    rooms: {},
    quests: {},
    enemies: {},
    items: {},
    roomGraphs: {},
    report: [],
    validationSummary: "",
    abortReason: null,
    outputPath: null,
  };
}

describe("buildChapterArtifact", () => {
  let fixture: WorldFixture;

  beforeAll(async () => {
    fixture = await loadWorldFixture("ashen-road");
  });

  it("assembles the first chapter without an unlock quest", () => {
    const chapter = buildChapterArtifact(chapterState(fixture, 1), generatedAt);

    expect(chapter).toEqual({
      chapterId: "chapter_1",
      chapterName: "The Ashen Road",
      chapterNumber: 1,
      chapterDescription: "The road to Ember Square runs past a restless crypt.",
      chapterIntro: "Smoke hangs over the gate as you arrive.",
      unlockQuestId: null,
      completionQuestId: "q_clear_crypt",
      unlockFlags: [],
      baseDifficulty: 2,
      minEnemyCR: 1,
      maxEnemyCR: 3,
      locationIds: ["ch1_gate", "ch1_square", "ch1_crypt"],
      questIds: ["q_clear_crypt"],
      mainQuestIds: ["q_clear_crypt"],
      enemyIds: ["ghoul"],
      itemIds: ["crypt_sigil"],
      npcIds: ["npc_warden"],
      mapId: "chapter_1_map",
      hubLocationId: "ch1_square",
      entryLocationId: "ch1_gate",
      exitLocationId: "ch1_crypt",
      generatedAt: "2026-01-01T00:00:00.000Z",
      isGenerated: true,
    });
  });

  it("unlocks a chapter with the previous chapter's completion quest", () => {
    const first = buildChapterArtifact(chapterState(fixture, 1), generatedAt);
    expect(first).not.toBeNull();
    if (!first) return;

    const second = buildChapterArtifact({ ...chapterState(fixture, 2), chapters: [first] }, generatedAt);

    expect(second?.unlockQuestId).toBe("q_clear_crypt");
    expect(second?.unlockFlags).toEqual(["q_clear_crypt_complete"]);
    expect(second?.completionQuestId).toBe("q_light_beacon");
    expect(second?.baseDifficulty).toBe(4);
  });

  it("falls back to the previous chapter's last main quest", () => {
    const first = buildChapterArtifact(chapterState(fixture, 1), generatedAt);
    if (!first) throw new Error("first chapter missing");
    const previous = { ...first, completionQuestId: null, mainQuestIds: ["q_one", "q_two"] };

    const second = buildChapterArtifact({ ...chapterState(fixture, 2), chapters: [previous] }, generatedAt);
    expect(second?.unlockQuestId).toBe("q_two");
  });

  it("returns null without an outline or room graph", () => {
    expect(buildChapterArtifact({ ...chapterState(fixture, 1), roomGraph: null }, generatedAt)).toBeNull();
  });
});
