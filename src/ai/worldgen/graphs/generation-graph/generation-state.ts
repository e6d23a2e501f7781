/**
 * State for the World Generation Graph
 *
 * Run-wide accumulators (chapters, artifact maps, report) merge node results
 * through their reducers; per-chapter working values are replaced each time
 * a chapter starts.
 */

import { Annotation } from "@langchain/langgraph";
import { ChapterArtifact, ChapterOutline, RoomGraph } from "#worldsmith/ai/worldgen/schemas.js";
import { JsonObject } from "#worldsmith/ai/worldgen/validators.js";
import { ReportEntry } from "#worldsmith/ai/worldgen/report.js";

export type GenerationStateType = typeof GenerationState.State;
export type GenerationStateUpdate = typeof GenerationState.Update;

const replace = <T>(_: T, y: T) => y;
const mergeRecords = <T>(x: Record<string, T>, y: Record<string, T>) => ({ ...x, ...y });

/** Replaces chapters with the same id, otherwise appends; keeps chapter order. */
function mergeChapters(x: ChapterArtifact[], y: ChapterArtifact[]): ChapterArtifact[] {
  const merged = [...x];
  for (const chapter of y) {
    const index = merged.findIndex((c) => c.chapterId === chapter.chapterId);
    if (index === -1) merged.push(chapter);
    else merged[index] = chapter;
  }
  return merged.sort((a, b) => a.chapterNumber - b.chapterNumber);
}

export const GenerationState = Annotation.Root({
  // Chapter currently being generated (1-based) and the last one this run produces
  chapterNumber: Annotation<number>({
    reducer: replace,
    default: () => 1,
  }),
  lastChapterNumber: Annotation<number>({
    reducer: replace,
    default: () => 1,
  }),

  // Per-chapter working values
  outline: Annotation<ChapterOutline | null>({
    reducer: replace,
    default: () => null,
  }),
  roomGraph: Annotation<RoomGraph | null>({
    reducer: replace,
    default: () => null,
  }),
  chapterQuestIds: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),
  chapterMainQuestIds: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),
  chapterEnemyIds: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),
  chapterItemIds: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),

  // Run-wide accumulators
  chapters: Annotation<ChapterArtifact[]>({
    reducer: mergeChapters,
    default: () => [],
  }),
  rooms: Annotation<Record<string, JsonObject>>({
    reducer: mergeRecords,
    default: () => ({}),
  }),
  quests: Annotation<Record<string, JsonObject>>({
    reducer: mergeRecords,
    default: () => ({}),
  }),
  enemies: Annotation<Record<string, JsonObject>>({
    reducer: mergeRecords,
    default: () => ({}),
  }),
  items: Annotation<Record<string, JsonObject>>({
    reducer: mergeRecords,
    default: () => ({}),
  }),
  roomGraphs: Annotation<Record<string, RoomGraph>>({
    reducer: mergeRecords,
    default: () => ({}),
  }),

  report: Annotation<ReportEntry[]>({
    reducer: (x, y) => [...x, ...y],
    default: () => [],
  }),
  validationSummary: Annotation<string>({
    reducer: replace,
    default: () => "",
  }),

  // Set by a node that cannot continue; routes the run to abort_run
  abortReason: Annotation<string | null>({
    reducer: replace,
    default: () => null,
  }),
  outputPath: Annotation<string | null>({
    reducer: replace,
    default: () => null,
  }),
});
