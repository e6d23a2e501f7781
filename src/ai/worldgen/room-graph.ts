/**
 * Room graph helpers: lookup, neighbour resolution and reverse-edge repair.
 *
 * Model-proposed graphs are treated as untrusted. The repair only adds the
 * missing half of an edge between two rooms that both exist; edges to unknown
 * rooms are left in place for the validator to report.
 */

import { RoomGraph, RoomNode } from "#worldsmith/ai/worldgen/schemas.js";

export type Edge = [from: string, to: string];

export interface RepairResult {
  graph: RoomGraph;
  addedEdges: Edge[];
}

export function getRoom(graph: RoomGraph, roomId: string): RoomNode | undefined {
  return graph.rooms.find((room) => room.roomId === roomId);
}

/**
 * Neighbours of a room that exist in the graph, in connectsTo order, without
 * duplicates.
 */
export function resolveNeighbors(graph: RoomGraph, roomId: string): RoomNode[] {
  const room = getRoom(graph, roomId);
  if (!room) return [];

  const seen = new Set<string>();
  const neighbors: RoomNode[] = [];
  for (const targetId of room.connectsTo) {
    if (seen.has(targetId)) continue;
    seen.add(targetId);
    const target = getRoom(graph, targetId);
    if (target) neighbors.push(target);
  }
  return neighbors;
}

/**
 * Edges (A, B) between existing rooms where B does not list A.
 */
export function findMissingReverseEdges(graph: RoomGraph): Edge[] {
  const byId = new Map(graph.rooms.map((room) => [room.roomId, room]));
  const missing: Edge[] = [];

  for (const room of graph.rooms) {
    for (const targetId of room.connectsTo) {
      const target = byId.get(targetId);
      if (target && !target.connectsTo.includes(room.roomId)) {
        missing.push([room.roomId, targetId]);
      }
    }
  }
  return missing;
}

/**
 * Returns a copy of the graph in which every edge between existing rooms has
 * its reverse, plus the reverse edges that were inserted. Applying it to its
 * own output inserts nothing.
 */
export function ensureBidirectional(graph: RoomGraph): RepairResult {
  const rooms = graph.rooms.map((room) => ({ ...room, connectsTo: [...room.connectsTo] }));
  const byId = new Map(rooms.map((room) => [room.roomId, room]));
  const addedEdges: Edge[] = [];

  for (const room of rooms) {
    for (const targetId of room.connectsTo) {
      const target = byId.get(targetId);
      if (target && target !== room && !target.connectsTo.includes(room.roomId)) {
        target.connectsTo.push(room.roomId);
        addedEdges.push([targetId, room.roomId]);
      }
    }
  }

  return { graph: { ...graph, rooms }, addedEdges };
}

/**
 * Sorted "from->to" strings, for comparing edge sets.
 */
export function edgeSet(graph: RoomGraph): string[] {
  const edges = new Set<string>();
  for (const room of graph.rooms) {
    for (const targetId of room.connectsTo) {
      edges.add(`${room.roomId}->${targetId}`);
    }
  }
  return [...edges].sort();
}
