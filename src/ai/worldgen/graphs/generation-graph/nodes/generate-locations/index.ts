/**
 * Generate Locations Node
 *
 * One request per room of the repaired graph, with a prompt built for the
 * room's type. A room that cannot be fetched or parsed is reported and
 * skipped; its id stays in the chapter so the gap shows up in the
 * integrity check. A room id an earlier chapter already lists is reported
 * and not generated again, so the earlier room is never replaced.
 */

import { JsonObject } from "#worldsmith/ai/worldgen/validators.js";
import { ReportEntry, reportError } from "#worldsmith/ai/worldgen/report.js";
import { RoomType, isRoomType } from "#worldsmith/ai/worldgen/schemas.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { abortWith, earlierOwner, isCancelled, requestArtifact } from "../../node-shared.js";
import { buildRoomPrompt } from "./prompts.js";

export function generateLocations(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    const { outline, roomGraph: graph } = state;
    if (!outline || !graph) {
      return abortWith(ctx, [reportError("schema", "locations", "No room graph to generate locations from")]);
    }

    const chapterNumber = state.chapterNumber;
    const knownRoomIds = new Set(graph.rooms.map((r) => r.roomId));
    const rooms: Record<string, JsonObject> = {};
    const report: ReportEntry[] = [];
    const seen = new Set<string>();

    ctx.relay.status(`Chapter ${chapterNumber}: Generating ${graph.rooms.length} locations...`);

    for (const [index, node] of graph.rooms.entries()) {
      if (isCancelled(ctx)) break;
      if (!node.roomId || seen.has(node.roomId)) continue;
      seen.add(node.roomId);

      const owner = earlierOwner(state, "locationIds", node.roomId);
      if (owner) {
        const message = `Room '${node.roomId}' already belongs to ${owner}; kept the earlier room`;
        console.warn(`[generate-locations] ${message}`);
        report.push(reportError("integrity", "locations", message, node.roomId));
        continue;
      }

      ctx.relay.status(
        `Chapter ${chapterNumber}: Location ${index + 1}/${graph.rooms.length} - ${node.roomName || node.roomId}`
      );

      let roomType: RoomType = "crossroad";
      if (isRoomType(node.roomType)) {
        roomType = node.roomType;
      } else {
        console.warn(`[generate-locations] Room ${node.roomId} has unknown type '${node.roomType}', using crossroad`);
      }

      const prompt = buildRoomPrompt(roomType, {
        room: node,
        graph,
        chapterNumber,
        chapterName: outline.chapterName,
        npcs: outline.keyNPCs,
        enemies: outline.enemies,
      });

      const outcome = await requestArtifact(ctx, "room", "locations", node.roomId, prompt, {
        knownRoomIds,
        expectedRoomType: roomType,
      });
      if (outcome.ok) {
        rooms[node.roomId] = outcome.document;
      } else {
        report.push(outcome.entry);
      }
    }

    console.debug(
      `[generate-locations] Chapter ${chapterNumber}: ${Object.keys(rooms).length}/${seen.size} rooms generated`
    );
    return { rooms, report };
  };
}
