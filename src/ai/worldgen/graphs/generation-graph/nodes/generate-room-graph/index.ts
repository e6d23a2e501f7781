/**
 * Generate Room Graph Node
 *
 * Requests the chapter's room connectivity graph, then adds any missing
 * reverse edges before a single room is generated. Structural problems that
 * leave nothing to build on (no rooms, hub/entry/exit not in the room list)
 * abort the run; the rest is reported by the Validate stage against the
 * repaired graph.
 */

import { validateArtifact } from "#worldsmith/ai/worldgen/validators.js";
import { ensureBidirectional } from "#worldsmith/ai/worldgen/room-graph.js";
import { reportError } from "#worldsmith/ai/worldgen/report.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { abortWith } from "../../node-shared.js";
import { buildRoomGraphPrompt } from "./prompts.js";

export function generateRoomGraph(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    const outline = state.outline;
    if (!outline) {
      return abortWith(ctx, [reportError("schema", "graph", "No chapter outline to build a room graph from")]);
    }
    const chapterId = outline.chapterId;
    const mapId = `${chapterId}_map`;
    ctx.relay.status(`Chapter ${state.chapterNumber}: Generating room graph...`);

    const response = await ctx.client.send(buildRoomGraphPrompt(outline, ctx.config.settings), ctx.systemPrompt);
    if (!response.ok) {
      return abortWith(ctx, [
        reportError("transport", "graph", `Failed to generate room graph: ${response.error}`, mapId),
      ]);
    }

    const result = validateArtifact("graph", response.content);
    if (!result.parsed) {
      const kind = result.document ? "schema" : "parse";
      return abortWith(ctx, [
        reportError(kind, "graph", `Invalid room graph: ${result.errors.join("; ")}`, mapId),
      ]);
    }

    const graph = { ...result.parsed, chapterId };
    const roomIds = new Set(graph.rooms.map((r) => r.roomId));
    const fatal: string[] = [];
    if (graph.rooms.length === 0) fatal.push("Room graph has no rooms");
    for (const [field, roomId] of [
      ["hubRoomId", graph.hubRoomId],
      ["entryRoomId", graph.entryRoomId],
      ["exitRoomId", graph.exitRoomId],
    ] as const) {
      if (graph.rooms.length > 0 && !roomIds.has(roomId)) {
        fatal.push(`${field} '${roomId}' not found in room list`);
      }
    }
    if (fatal.length > 0) {
      return abortWith(ctx, fatal.map((message) => reportError("schema", "graph", message, mapId)));
    }

    const { graph: repaired, addedEdges } = ensureBidirectional(graph);
    if (addedEdges.length > 0) {
      console.debug(`[generate-room-graph] ${chapterId}: added ${addedEdges.length} reverse edge(s)`);
    }
    console.debug(`[generate-room-graph] ${chapterId}: ${repaired.rooms.length} rooms`);

    return {
      roomGraph: repaired,
      roomGraphs: { [chapterId]: repaired },
    };
  };
}
