import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ContentStoreError } from "../../error.js";
import { ContentStore, emptyArtifactSet } from "../content-store.js";
import { ChapterArtifact, StoryManifest, StoryManifestSchema, WorldBriefSchema } from "../schemas.js";

const brief = WorldBriefSchema.parse({ worldName: "Emberfall" });

const manifest = (chapterIds: string[]): StoryManifest =>
  StoryManifestSchema.parse({
    storyId: "ashen_road",
    storyName: "Emberfall",
    storyDescription: "A generated adventure.",
    startingRoom: "ch1_square",
    configId: "ashen_road",
    configName: "Ashen Road",
    createdAt: "2026-01-01T00:00:00.000Z",
    generatedBy: "worldsmith (openai/test-model)",
    worldBrief: brief,
    settings: {},
    provider: {},
    chapterIds,
  });

const chapter: ChapterArtifact = {
  chapterId: "chapter_1",
  chapterName: "The Ashen Road",
  chapterNumber: 1,
  chapterDescription: "",
  chapterIntro: "",
  unlockQuestId: null,
  completionQuestId: "q_a",
  unlockFlags: [],
  baseDifficulty: 2,
  minEnemyCR: 1,
  maxEnemyCR: 3,
  locationIds: ["ch1_square", "ch1_crypt"],
  questIds: ["q_a"],
  mainQuestIds: ["q_a"],
  enemyIds: [],
  itemIds: [],
  npcIds: [],
  mapId: "chapter_1_map",
  hubLocationId: "ch1_square",
  entryLocationId: "ch1_square",
  exitLocationId: "ch1_square",
  generatedAt: "2026-01-01T00:00:00.000Z",
  isGenerated: true,
};

describe("ContentStore", () => {
  let root: string;
  let store: ContentStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "worldsmith-store-"));
    store = new ContentStore(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes one file per artifact under its kind's directory", async () => {
    const artifacts = {
      ...emptyArtifactSet(),
      chapters: [chapter],
      rooms: { ch1_square: { room_id: "ch1_square" } },
      quests: { q_a: { questId: "q_a" } },
      roomGraphs: {
        chapter_1: { chapterId: "chapter_1", hubRoomId: "ch1_square", entryRoomId: "ch1_square", exitRoomId: "ch1_square", rooms: [] },
      },
    };

    const result = await store.writeRun(manifest(["chapter_1"]), brief, artifacts);

    expect(result).toEqual({ storyPath: path.join(root, "ashen_road"), filesWritten: 6, failures: [] });
    const room = JSON.parse(await fs.readFile(path.join(root, "ashen_road", "Rooms", "ch1_square.json"), "utf8"));
    expect(room).toEqual({ room_id: "ch1_square" });
    await expect(fs.access(path.join(root, "ashen_road", "Maps", "chapter_1_map.json"))).resolves.toBeUndefined();
    await expect(store.exists("ashen_road")).resolves.toBe(true);
  });

  it("records unsafe ids as failures and keeps writing", async () => {
    const artifacts = { ...emptyArtifactSet(), rooms: { "../escape": { room_id: "x" }, ch1_ok: { room_id: "ch1_ok" } } };

    const result = await store.writeRun(manifest([]), brief, artifacts);

    expect(result.failures).toEqual([{ kind: "room", id: "../escape", message: "Unsafe artifact id: '../escape'" }]);
    expect(result.filesWritten).toBe(3);
  });

  it("loads a story back and lists missing files", async () => {
    await store.writeRun(manifest(["chapter_1"]), brief, {
      ...emptyArtifactSet(),
      chapters: [chapter],
      rooms: { ch1_square: { room_id: "ch1_square" } },
      quests: { q_a: { questId: "q_a" } },
    });

    const loaded = await store.loadManifest("ashen_road");
    const { artifacts, missing } = await store.loadArtifacts(loaded);

    expect(loaded.chapterIds).toEqual(["chapter_1"]);
    expect(artifacts.chapters).toEqual([chapter]);
    expect(Object.keys(artifacts.rooms)).toEqual(["ch1_square"]);
    expect(artifacts.quests).toEqual({ q_a: { questId: "q_a" } });
    expect(missing).toEqual(["ch1_crypt", "chapter_1_map"]);
  });

  it("rejects a story without a manifest", async () => {
    await expect(store.exists("nothing_here")).resolves.toBe(false);
    await expect(store.loadManifest("nothing_here")).rejects.toThrow(
      new ContentStoreError("No world config found for story 'nothing_here'")
    );
  });
});
