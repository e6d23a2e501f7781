import { beforeAll, describe, expect, it } from "@jest/globals";
import { ChapterArtifact, ChapterOutlineSchema, RoomGraphSchema } from "#worldsmith/ai/worldgen/schemas.js";
import { ChapterReplies, loadWorldFixture } from "#worldsmith/ai/worldgen/test/fixture-loader.js";
import { buildChapterArtifact } from "../../finalize-chapter/index.js";
import { validateContent } from "../index.js";

function firstChapter(replies: ChapterReplies): ChapterArtifact {
  const outline = ChapterOutlineSchema.parse(replies.outline);
  const chapter = buildChapterArtifact(
    {
      chapterNumber: 1,
      lastChapterNumber: 1,
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
    },
    new Date("2026-01-01T00:00:00.000Z")
  );
  if (!chapter) throw new Error("fixture chapter did not assemble");
  return chapter;
}

describe("validateContent", () => {
  let replies: ChapterReplies;

  beforeAll(async () => {
    replies = (await loadWorldFixture("ashen-road")).chapters["1"];
  });

  const contentOf = (rooms: ChapterReplies["rooms"]) => ({
    chapters: [firstChapter(replies)],
    rooms,
    quests: replies.quests,
    enemies: replies.enemies,
    items: replies.items,
    roomGraphs: { chapter_1: RoomGraphSchema.parse(replies.graph) },
  });

  it("reports nothing for a consistent chapter", () => {
    const { entries, summary } = validateContent(contentOf(replies.rooms));

    expect(entries).toEqual([]);
    expect(summary.split("\n").slice(0, 7)).toEqual([
      "=== GENERATED CONTENT REPORT ===",
      "",
      "Total Chapters: 1",
      "Total Rooms: 3",
      "Total Quests: 1",
      "Total Enemies: 1",
      "Total Items: 1",
    ]);
    expect(summary.endsWith("Errors: 0\nWarnings: 0")).toBe(true);
  });

  it("reports exits and references to a room that was never generated", () => {
    const rooms = Object.fromEntries(Object.entries(replies.rooms).filter(([roomId]) => roomId !== "ch1_crypt"));
    const { entries } = validateContent(contentOf(rooms));

    expect(entries.filter((e) => e.kind === "schema")).toEqual([
      {
        kind: "schema",
        severity: "error",
        stage: "validate",
        artifactId: "ch1_square",
        message: "Exit 'Down to the crypt' leads to unknown room: 'ch1_crypt'",
      },
    ]);
    expect(entries.filter((e) => e.kind === "integrity").map((e) => [e.severity, e.message])).toEqual([
      ["error", "Chapter chapter_1 references missing room 'ch1_crypt'"],
      ["error", "Chapter chapter_1 exitLocationId 'ch1_crypt' not found"],
      ["warning", "Quest q_clear_crypt reveals unknown room 'ch1_crypt'"],
    ]);
  });

  it("checks rooms against the type the graph planned", () => {
    const gate = { ...replies.rooms.ch1_gate, room_type: "combat", combat: { enemyId: "ghoul" } };
    const { entries } = validateContent(contentOf({ ...replies.rooms, ch1_gate: gate }));

    expect(entries.filter((e) => e.artifactId === "ch1_gate").map((e) => e.message)).toEqual([
      "room_type 'combat' does not match planned type 'crossroad'",
    ]);
  });
});
