/**
 * Persist Content Node
 *
 * Writes every artifact of the run, the world brief and the story manifest
 * to the content store. Individual write failures are reported and the rest
 * of the files are still written.
 */

import { ContentStoreError } from "#worldsmith/ai/error.js";
import { ReportEntry, reportError } from "#worldsmith/ai/worldgen/report.js";
import { ChapterArtifact, StoryManifest, WorldGenerationConfig } from "#worldsmith/ai/worldgen/schemas.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { abortWith } from "../../node-shared.js";

export const DEFAULT_STORY_DESCRIPTION = "A generated adventure.";

export interface ManifestInput {
  config: WorldGenerationConfig;
  storyId: string;
  chapters: ChapterArtifact[];
  createdAt: Date;
  /** Manifest of the story being extended, when adding a chapter. */
  existing?: StoryManifest;
}

export function buildStoryManifest({ config, storyId, chapters, createdAt, existing }: ManifestInput): StoryManifest {
  const first = chapters[0];
  const startingRoom = first ? first.hubLocationId || first.locationIds[0] || "" : "";

  return {
    storyId,
    storyName: existing?.storyName ?? config.worldBrief.worldName,
    storyDescription: config.storyDescription ?? existing?.storyDescription ?? DEFAULT_STORY_DESCRIPTION,
    startingRoom,
    startingGold: existing?.startingGold ?? 50,
    startingHealth: existing?.startingHealth ?? 100,
    configId: config.configId ?? existing?.configId ?? storyId,
    configName: config.configName,
    createdAt: existing?.createdAt ?? createdAt.toISOString(),
    generatedBy: `worldsmith (${config.provider.provider}/${config.provider.model})`,
    worldBrief: config.worldBrief,
    settings: config.settings,
    provider: config.provider,
    chapterIds: chapters.map((c) => c.chapterId),
  };
}

export function persistContent(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    ctx.relay.status("Saving to JSON files...");

    const manifest = buildStoryManifest({
      config: ctx.config,
      storyId: ctx.storyId,
      chapters: state.chapters,
      createdAt: ctx.now ? ctx.now() : new Date(),
      existing: ctx.existingManifest,
    });

    try {
      const result = await ctx.store.writeRun(manifest, ctx.config.worldBrief, {
        chapters: state.chapters,
        rooms: state.rooms,
        quests: state.quests,
        enemies: state.enemies,
        items: state.items,
        roomGraphs: state.roomGraphs,
      });

      const report: ReportEntry[] = result.failures.map((failure) =>
        reportError("storage", "persist", `Failed to write ${failure.kind}: ${failure.message}`, failure.id)
      );
      ctx.relay.status(`Saved to: ${result.storyPath}`);
      ctx.relay.progress(1);
      return { outputPath: result.storyPath, report };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const artifactId = error instanceof ContentStoreError ? error.path : undefined;
      return abortWith(ctx, [reportError("storage", "persist", `Failed to save story: ${message}`, artifactId)]);
    }
  };
}
