/**
 * World Generation Graph
 *
 * One compiled graph per run:
 *   generate_outline -> generate_room_graph -> generate_locations ->
 *   generate_quests -> generate_enemies -> generate_items -> finalize_chapter
 *   -> (generate_outline for the next chapter | validate_content) ->
 *   persist_content -> END
 *
 * After every node the router checks for a fatal error or a cancelled
 * signal and sends the run to abort_run instead.
 */

import { END, START, StateGraph } from "@langchain/langgraph";
import { GenerationContext } from "./generation-context.js";
import { GenerationState, GenerationStateType } from "./generation-state.js";
import { generateOutline } from "./nodes/generate-outline/index.js";
import { generateRoomGraph } from "./nodes/generate-room-graph/index.js";
import { generateLocations } from "./nodes/generate-locations/index.js";
import { generateQuests } from "./nodes/generate-quests/index.js";
import { generateEnemies } from "./nodes/generate-enemies/index.js";
import { generateItems } from "./nodes/generate-items/index.js";
import { finalizeChapter } from "./nodes/finalize-chapter/index.js";
import { validateContentNode } from "./nodes/validate-content/index.js";
import { persistContent } from "./nodes/persist-content/index.js";
import { abortRun } from "./nodes/abort-run/index.js";

const ABORT = "abort_run";

/** Steps per chapter, plus validate/persist/abort, used for the recursion limit. */
export function recursionLimitFor(chapterCount: number): number {
  return chapterCount * 10 + 10;
}

export function createGenerationGraph(ctx: GenerationContext) {
  const shouldAbort = (state: GenerationStateType) => Boolean(state.abortReason) || ctx.signal.aborted;

  const routeTo =
    <T extends string>(next: T) =>
    (state: GenerationStateType): T | typeof ABORT =>
      shouldAbort(state) ? ABORT : next;

  const routeAfterChapter = (state: GenerationStateType) => {
    if (shouldAbort(state)) return ABORT;
    if (state.chapterNumber <= state.lastChapterNumber) {
      console.debug(`[GenerationGraph] Moving on to chapter ${state.chapterNumber}`);
      return "generate_outline";
    }
    return "validate_content";
  };

  const graph = new StateGraph(GenerationState)
    .addNode("generate_outline", generateOutline(ctx))
    .addNode("generate_room_graph", generateRoomGraph(ctx))
    .addNode("generate_locations", generateLocations(ctx))
    .addNode("generate_quests", generateQuests(ctx))
    .addNode("generate_enemies", generateEnemies(ctx))
    .addNode("generate_items", generateItems(ctx))
    .addNode("finalize_chapter", finalizeChapter(ctx))
    .addNode("validate_content", validateContentNode(ctx))
    .addNode("persist_content", persistContent(ctx))
    .addNode(ABORT, abortRun(ctx))
    .addConditionalEdges(START, routeTo("generate_outline"), ["generate_outline", ABORT])
    .addConditionalEdges("generate_outline", routeTo("generate_room_graph"), ["generate_room_graph", ABORT])
    .addConditionalEdges("generate_room_graph", routeTo("generate_locations"), ["generate_locations", ABORT])
    .addConditionalEdges("generate_locations", routeTo("generate_quests"), ["generate_quests", ABORT])
    .addConditionalEdges("generate_quests", routeTo("generate_enemies"), ["generate_enemies", ABORT])
    .addConditionalEdges("generate_enemies", routeTo("generate_items"), ["generate_items", ABORT])
    .addConditionalEdges("generate_items", routeTo("finalize_chapter"), ["finalize_chapter", ABORT])
    .addConditionalEdges("finalize_chapter", routeAfterChapter, ["generate_outline", "validate_content", ABORT])
    .addConditionalEdges("validate_content", routeTo("persist_content"), ["persist_content", ABORT])
    .addConditionalEdges("persist_content", (state: GenerationStateType) => (state.abortReason ? ABORT : END), [
      ABORT,
      END,
    ])
    .addEdge(ABORT, END);

  console.log("[GenerationGraph] Graph compiled successfully");
  return graph.compile();
}

export type GenerationGraph = ReturnType<typeof createGenerationGraph>;
