import { ModelClient } from "#worldsmith/ai/worldgen/model-client.js";
import { ContentStore } from "#worldsmith/ai/worldgen/content-store.js";
import { GenerationReport } from "#worldsmith/ai/worldgen/report.js";
import {
  ChapterArtifact,
  ChapterOutline,
  StoryManifest,
  WorldGenerationConfig,
} from "#worldsmith/ai/worldgen/schemas.js";

export interface GenerationObserver {
  onStatus?: (status: string) => void;
  /** Fraction of the run completed, 0..1. */
  onProgress?: (progress: number) => void;
  onChapterOutline?: (outline: ChapterOutline) => void;
  onChapterGenerated?: (chapter: ChapterArtifact) => void;
  onError?: (message: string) => void;
  /** Text summary produced by the Validate stage. */
  onValidationReport?: (summary: string) => void;
  onComplete?: (report: GenerationReport) => void;
}

/**
 * Forwards events to a caller's observer. Observers are advisory: an
 * exception thrown by one is logged and does not reach the pipeline.
 */
export class ObserverRelay {
  constructor(private readonly observer: GenerationObserver = {}) {}

  status(status: string): void {
    console.log(`[world-generator] ${status}`);
    this.safely("onStatus", () => this.observer.onStatus?.(status));
  }

  progress(progress: number): void {
    this.safely("onProgress", () => this.observer.onProgress?.(Math.min(1, Math.max(0, progress))));
  }

  chapterOutline(outline: ChapterOutline): void {
    this.safely("onChapterOutline", () => this.observer.onChapterOutline?.(outline));
  }

  chapterGenerated(chapter: ChapterArtifact): void {
    this.safely("onChapterGenerated", () => this.observer.onChapterGenerated?.(chapter));
  }

  error(message: string): void {
    this.safely("onError", () => this.observer.onError?.(message));
  }

  validationReport(summary: string): void {
    this.safely("onValidationReport", () => this.observer.onValidationReport?.(summary));
  }

  complete(report: GenerationReport): void {
    this.safely("onComplete", () => this.observer.onComplete?.(report));
  }

  private safely(event: keyof GenerationObserver, call: () => void): void {
    try {
      call();
    } catch (error) {
      console.error(`[world-generator] Observer ${event} threw:`, error);
    }
  }
}

/** Everything a node needs besides graph state. Fixed for the whole run. */
export interface GenerationContext {
  config: WorldGenerationConfig;
  storyId: string;
  client: ModelClient;
  store: ContentStore;
  systemPrompt: string;
  signal: AbortSignal;
  relay: ObserverRelay;
  /** First chapter number produced by this run (1 for a new story). */
  firstChapterNumber: number;
  /** Manifest of the story being extended by a next-chapter run. */
  existingManifest?: StoryManifest;
  now?: () => Date;
}
