/**
 * File-based content store for generated worlds.
 *
 * Layout, one directory per story:
 *   <root>/<storyId>/config.json        run manifest
 *   <root>/<storyId>/world_prompt.json  world brief
 *   <root>/<storyId>/{Chapters,Rooms,Quests,Enemies,Items,Maps}/<id>.json
 *
 * This layout is the contract with the game runtime, which reads files by id.
 */

import fs from "fs/promises";
import path from "path";
import { ContentStoreError } from "#worldsmith/ai/error.js";
import {
  ChapterArtifact,
  ChapterArtifactSchema,
  RoomGraph,
  RoomGraphSchema,
  StoryManifest,
  StoryManifestSchema,
  WorldBrief,
} from "#worldsmith/ai/worldgen/schemas.js";
import { JsonObject, isJsonObject } from "#worldsmith/ai/worldgen/validators.js";

export const MANIFEST_FILE = "config.json";
export const WORLD_BRIEF_FILE = "world_prompt.json";

export const ARTIFACT_DIRS = {
  chapter: "Chapters",
  room: "Rooms",
  quest: "Quests",
  enemy: "Enemies",
  item: "Items",
  map: "Maps",
} as const;

export type StoredKind = keyof typeof ARTIFACT_DIRS;

export interface ArtifactSet {
  chapters: ChapterArtifact[];
  rooms: Record<string, JsonObject>;
  quests: Record<string, JsonObject>;
  enemies: Record<string, JsonObject>;
  items: Record<string, JsonObject>;
  /** Repaired room graphs keyed by chapter id. */
  roomGraphs: Record<string, RoomGraph>;
}

export interface WriteFailure {
  kind: StoredKind | "manifest";
  id: string;
  message: string;
}

export interface WriteResult {
  storyPath: string;
  filesWritten: number;
  failures: WriteFailure[];
}

export interface LoadResult {
  artifacts: ArtifactSet;
  /** Artifact ids listed by a chapter whose file does not exist. */
  missing: string[];
}

const SAFE_ID = /^[\w.-]+$/;

export function emptyArtifactSet(): ArtifactSet {
  return { chapters: [], rooms: {}, quests: {}, enemies: {}, items: {}, roomGraphs: {} };
}

function fileNameFor(id: string): string {
  if (!SAFE_ID.test(id) || id.includes("..")) {
    throw new ContentStoreError(`Unsafe artifact id: '${id}'`);
  }
  return `${id}.json`;
}

async function ensureDirectoryExists(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
}

async function readJson(filePath: string): Promise<unknown> {
  const data = await fs.readFile(filePath, "utf8");
  return JSON.parse(data);
}

// fs errors are not always instances of this realm's Error (Jest runs
// modules in a separate context), so match on the code alone.
function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export class ContentStore {
  constructor(readonly rootDir: string) {}

  storyPath(storyId: string): string {
    return path.join(this.rootDir, storyId);
  }

  artifactPath(storyId: string, kind: StoredKind, id: string): string {
    return path.join(this.storyPath(storyId), ARTIFACT_DIRS[kind], fileNameFor(id));
  }

  async exists(storyId: string): Promise<boolean> {
    try {
      await fs.access(path.join(this.storyPath(storyId), MANIFEST_FILE));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async writeArtifact(storyId: string, kind: StoredKind, id: string, value: unknown): Promise<void> {
    const filePath = this.artifactPath(storyId, kind, id);
    await ensureDirectoryExists(path.dirname(filePath));
    await writeJson(filePath, value);
  }

  /**
   * Writes every artifact, one file each, then the brief and the manifest.
   * A failed artifact write is recorded and the remaining files are still
   * written; the manifest is written last so a story with a manifest always
   * has its artifacts on disk.
   */
  async writeRun(
    manifest: StoryManifest,
    brief: WorldBrief,
    artifacts: ArtifactSet
  ): Promise<WriteResult> {
    const storyId = manifest.storyId;
    const storyPath = this.storyPath(storyId);
    for (const dir of Object.values(ARTIFACT_DIRS)) {
      await ensureDirectoryExists(path.join(storyPath, dir));
    }

    const failures: WriteFailure[] = [];
    let filesWritten = 0;

    const write = async (kind: StoredKind, id: string, value: unknown) => {
      try {
        await this.writeArtifact(storyId, kind, id, value);
        filesWritten++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[content-store] Failed to write ${kind} ${id}: ${message}`);
        failures.push({ kind, id, message });
      }
    };

    for (const chapter of artifacts.chapters) await write("chapter", chapter.chapterId, chapter);
    for (const [id, room] of Object.entries(artifacts.rooms)) await write("room", id, room);
    for (const [id, quest] of Object.entries(artifacts.quests)) await write("quest", id, quest);
    for (const [id, enemy] of Object.entries(artifacts.enemies)) await write("enemy", id, enemy);
    for (const [id, item] of Object.entries(artifacts.items)) await write("item", id, item);
    for (const [chapterId, graph] of Object.entries(artifacts.roomGraphs)) {
      await write("map", `${chapterId}_map`, graph);
    }

    try {
      await writeJson(path.join(storyPath, WORLD_BRIEF_FILE), brief);
      await writeJson(path.join(storyPath, MANIFEST_FILE), manifest);
      filesWritten += 2;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[content-store] Failed to write manifest for ${storyId}: ${message}`);
      failures.push({ kind: "manifest", id: storyId, message });
    }

    console.log(`[content-store] Saved ${filesWritten} files to ${storyPath}`);
    return { storyPath, filesWritten, failures };
  }

  async loadManifest(storyId: string): Promise<StoryManifest> {
    const manifestPath = path.join(this.storyPath(storyId), MANIFEST_FILE);
    let raw: unknown;
    try {
      raw = await readJson(manifestPath);
    } catch (error) {
      const message = isMissingFile(error)
        ? `No world config found for story '${storyId}'`
        : `Failed to read world config: ${error instanceof Error ? error.message : String(error)}`;
      throw new ContentStoreError(message, manifestPath);
    }

    const result = StoryManifestSchema.safeParse(raw);
    if (!result.success) {
      throw new ContentStoreError(
        `Invalid world config for story '${storyId}': ${result.error.issues.map((i) => i.message).join("; ")}`,
        manifestPath
      );
    }
    return result.data;
  }

  /**
   * Loads the chapters named by the manifest and every artifact they list.
   */
  async loadArtifacts(manifest: StoryManifest): Promise<LoadResult> {
    const storyId = manifest.storyId;
    const artifacts = emptyArtifactSet();
    const missing: string[] = [];

    const load = async (kind: StoredKind, id: string): Promise<unknown | undefined> => {
      try {
        return await readJson(this.artifactPath(storyId, kind, id));
      } catch (error) {
        if (isMissingFile(error)) {
          missing.push(id);
          return undefined;
        }
        throw new ContentStoreError(
          `Failed to read ${kind} '${id}': ${error instanceof Error ? error.message : String(error)}`,
          this.artifactPath(storyId, kind, id)
        );
      }
    };

    const loadDocuments = async (kind: StoredKind, ids: string[], into: Record<string, JsonObject>) => {
      for (const id of ids) {
        const value = await load(kind, id);
        if (isJsonObject(value)) into[id] = value;
      }
    };

    for (const chapterId of manifest.chapterIds) {
      const raw = await load("chapter", chapterId);
      if (raw === undefined) continue;
      const chapter = ChapterArtifactSchema.safeParse(raw);
      if (!chapter.success) {
        throw new ContentStoreError(`Invalid chapter file '${chapterId}'`);
      }
      artifacts.chapters.push(chapter.data);

      await loadDocuments("room", chapter.data.locationIds, artifacts.rooms);
      await loadDocuments("quest", chapter.data.questIds, artifacts.quests);
      await loadDocuments("enemy", chapter.data.enemyIds, artifacts.enemies);
      await loadDocuments("item", chapter.data.itemIds, artifacts.items);

      if (chapter.data.mapId) {
        const graph = RoomGraphSchema.safeParse(await load("map", chapter.data.mapId));
        if (graph.success) artifacts.roomGraphs[chapter.data.chapterId] = graph.data;
      }
    }

    return { artifacts, missing };
  }
}
