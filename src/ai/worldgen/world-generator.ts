/**
 * World Generator
 *
 * Caller-facing entry point. One generator runs at most one generation at a
 * time. A second start while a run is active, an invalid config or an
 * unknown story is rejected up front; once the graph is running every
 * failure ends up in the returned GenerationReport instead.
 */

import { getConfig } from "#worldsmith/config.js";
import { GenerationInProgressError, WorldConfigError } from "#worldsmith/ai/error.js";
import { getDefaultTracerProject } from "#worldsmith/ai/model-config.js";
import { ContentStore } from "#worldsmith/ai/worldgen/content-store.js";
import { JsonObject, isJsonObject } from "#worldsmith/ai/worldgen/validators.js";
import { ModelClient, ModelClientOptions } from "#worldsmith/ai/worldgen/model-client.js";
import {
  ArtifactCounts,
  GenerationReport,
  countBySeverity,
  reportError,
} from "#worldsmith/ai/worldgen/report.js";
import {
  StoryManifest,
  WorldGenerationConfig,
  WorldGenerationConfigInput,
  WorldGenerationConfigSchema,
} from "#worldsmith/ai/worldgen/schemas.js";
import { buildSystemPrompt } from "#worldsmith/ai/worldgen/graphs/generation-graph/prompts.js";
import { createGenerationGraph, recursionLimitFor } from "#worldsmith/ai/worldgen/graphs/generation-graph/index.js";
import {
  GenerationContext,
  GenerationObserver,
  ObserverRelay,
} from "#worldsmith/ai/worldgen/graphs/generation-graph/generation-context.js";
import {
  GenerationStateType,
  GenerationStateUpdate,
} from "#worldsmith/ai/worldgen/graphs/generation-graph/generation-state.js";

export const DEFAULT_STORY_ID = "generated_world";

export interface WorldGeneratorOptions {
  store?: ContentStore;
  observer?: GenerationObserver;
  /** Model client overrides: a pre-built chat model, provider, clock. */
  client?: Pick<ModelClientOptions, "model" | "provider" | "now" | "sleep">;
  tracerProjectName?: string;
  now?: () => Date;
}

export type GeneratorState = "idle" | "running" | "completed" | "aborted";

export interface GeneratorStatus {
  state: GeneratorState;
  storyId: string | null;
  message: string;
  progress: number;
  tokensUsed: number;
  report: GenerationReport | null;
}

interface RunPlan {
  config: WorldGenerationConfig;
  storyId: string;
  credential: string;
  firstChapterNumber: number;
  lastChapterNumber: number;
  existingManifest?: StoryManifest;
  initial: GenerationStateUpdate;
}

/**
 * Fills provider and model from the environment defaults when the config
 * does not name a provider.
 */
export function applyProviderDefaults(input: unknown): unknown {
  if (!isJsonObject(input)) return input;
  const provider = isJsonObject(input.provider) ? input.provider : {};
  if (provider.provider !== undefined) return input;

  const defaults: JsonObject = { provider: getConfig("default-provider") };
  const model = getConfig("default-model");
  if (model && provider.model === undefined) defaults.model = model;
  return { ...input, provider: { ...provider, ...defaults } };
}

export function parseWorldConfig(input: unknown): WorldGenerationConfig {
  const result = WorldGenerationConfigSchema.safeParse(applyProviderDefaults(input));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new WorldConfigError(`Invalid world generation config: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

function countArtifacts(state: GenerationStateType): ArtifactCounts {
  return {
    chapters: state.chapters.length,
    rooms: Object.keys(state.rooms).length,
    quests: Object.keys(state.quests).length,
    enemies: Object.keys(state.enemies).length,
    items: Object.keys(state.items).length,
  };
}

export function buildGenerationReport(
  state: GenerationStateType,
  storyId: string,
  tokensUsed: number
): GenerationReport {
  return {
    status: state.abortReason ? "aborted" : "completed",
    storyId,
    chapterIds: state.chapters.map((c) => c.chapterId),
    entries: state.report,
    ...countBySeverity(state.report),
    tokensUsed,
    counts: countArtifacts(state),
    ...(state.outputPath ? { outputPath: state.outputPath } : {}),
    ...(state.abortReason ? { abortReason: state.abortReason } : {}),
  };
}

export class WorldGenerator {
  readonly store: ContentStore;
  private controller: AbortController | null = null;
  private client: ModelClient | null = null;
  private currentStoryId: string | null = null;
  private status: GeneratorStatus = {
    state: "idle",
    storyId: null,
    message: "Idle",
    progress: 0,
    tokensUsed: 0,
    report: null,
  };

  constructor(private readonly options: WorldGeneratorOptions = {}) {
    this.store = options.store ?? new ContentStore(getConfig("output-dir") || "./stories");
  }

  get isGenerating(): boolean {
    return this.controller !== null;
  }

  /**
   * Generates a new story of settings.totalChapters chapters.
   */
  async startGeneration(input: WorldGenerationConfigInput, credential: string): Promise<GenerationReport> {
    const controller = this.begin(credential);
    try {
      const config = parseWorldConfig(input);
      const storyId = config.storyId ?? DEFAULT_STORY_ID;
      return await this.run(controller, {
        config,
        storyId,
        credential,
        firstChapterNumber: 1,
        lastChapterNumber: config.settings.totalChapters,
        initial: {},
      });
    } finally {
      this.controller = null;
    }
  }

  /**
   * Adds one chapter to a persisted story: reloads its manifest and
   * artifacts, generates chapter chapterIds.length + 1, then validates and
   * persists the whole set.
   */
  async generateNextChapter(credential: string, storyId?: string): Promise<GenerationReport> {
    const controller = this.begin(credential);
    try {
      const id = storyId ?? this.currentStoryId;
      if (!id) {
        throw new WorldConfigError("No world config loaded. Start a new world first.");
      }

      const manifest = await this.store.loadManifest(id);
      const { artifacts, missing } = await this.store.loadArtifacts(manifest);
      if (missing.length > 0) {
        console.warn(`[world-generator] Story ${id} is missing ${missing.length} artifact file(s): ${missing.join(", ")}`);
      }

      const config: WorldGenerationConfig = {
        configId: manifest.configId,
        configName: manifest.configName,
        storyId: id,
        storyDescription: manifest.storyDescription,
        worldBrief: manifest.worldBrief,
        settings: manifest.settings,
        provider: manifest.provider,
      };
      const nextChapter = manifest.chapterIds.length + 1;

      return await this.run(controller, {
        config,
        storyId: id,
        credential,
        firstChapterNumber: nextChapter,
        lastChapterNumber: nextChapter,
        existingManifest: manifest,
        initial: {
          chapters: artifacts.chapters,
          rooms: artifacts.rooms,
          quests: artifacts.quests,
          enemies: artifacts.enemies,
          items: artifacts.items,
          roomGraphs: artifacts.roomGraphs,
        },
      });
    } finally {
      this.controller = null;
    }
  }

  /** Requests cooperative cancellation; returns false when nothing is running. */
  cancel(): boolean {
    if (!this.controller) return false;
    console.log("[world-generator] Cancellation requested");
    this.controller.abort();
    return true;
  }

  getStatus(): GeneratorStatus {
    return {
      ...this.status,
      tokensUsed: this.client?.tokensUsed ?? this.status.tokensUsed,
    };
  }

  private begin(credential: string): AbortController {
    if (this.controller) {
      new ObserverRelay(this.options.observer).error("Generation already in progress");
      throw new GenerationInProgressError();
    }
    if (!credential) {
      throw new WorldConfigError("A provider API key is required");
    }
    this.controller = new AbortController();
    return this.controller;
  }

  private createRelay(): ObserverRelay {
    const observer = this.options.observer ?? {};
    return new ObserverRelay({
      ...observer,
      onStatus: (status) => {
        this.status.message = status;
        observer.onStatus?.(status);
      },
      onProgress: (progress) => {
        this.status.progress = progress;
        observer.onProgress?.(progress);
      },
    });
  }

  private async run(controller: AbortController, plan: RunPlan): Promise<GenerationReport> {
    const relay = this.createRelay();
    this.status = {
      state: "running",
      storyId: plan.storyId,
      message: "Starting world generation...",
      progress: 0,
      tokensUsed: 0,
      report: null,
    };
    relay.status("Starting world generation...");

    const client = new ModelClient({
      config: plan.config.provider,
      credential: plan.credential,
      tracerProjectName: this.options.tracerProjectName ?? getDefaultTracerProject(),
      ...this.options.client,
      onStatus: (status) => relay.status(status),
      onError: (message) => relay.error(message),
    });
    this.client = client;

    const ctx: GenerationContext = {
      config: plan.config,
      storyId: plan.storyId,
      client,
      store: this.store,
      systemPrompt: buildSystemPrompt(plan.config.worldBrief),
      signal: controller.signal,
      relay,
      firstChapterNumber: plan.firstChapterNumber,
      existingManifest: plan.existingManifest,
      now: this.options.now,
    };

    let report: GenerationReport;
    try {
      const graph = createGenerationGraph(ctx);
      const finalState = await graph.invoke(
        {
          ...plan.initial,
          chapterNumber: plan.firstChapterNumber,
          lastChapterNumber: plan.lastChapterNumber,
        },
        { recursionLimit: recursionLimitFor(plan.lastChapterNumber - plan.firstChapterNumber + 1) }
      );
      report = buildGenerationReport(finalState, plan.storyId, client.tokensUsed);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("[world-generator] Generation failed:", error);
      relay.error(message);
      const entries = [reportError("internal", "run", `Generation failed: ${message}`)];
      report = {
        status: "aborted",
        storyId: plan.storyId,
        chapterIds: [],
        entries,
        ...countBySeverity(entries),
        tokensUsed: client.tokensUsed,
        counts: { chapters: 0, rooms: 0, quests: 0, enemies: 0, items: 0 },
        abortReason: message,
      };
    }

    this.client = null;
    this.status = { ...this.status, state: report.status, tokensUsed: report.tokensUsed, report };

    if (report.status === "completed") {
      this.currentStoryId = plan.storyId;
      relay.status("Generation complete!");
    }
    console.log(
      `[world-generator] Run ${report.status}: ${report.chapterIds.length} chapter(s), ` +
        `${report.errorCount} error(s), ${report.warningCount} warning(s), ${report.tokensUsed} tokens`
    );
    relay.complete(report);
    return report;
  }
}
