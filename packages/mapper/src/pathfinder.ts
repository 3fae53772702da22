/**
 * Breadth-first search over the known exits of a WorldMap.
 *
 * Neighbours are always expanded in canonical direction order, so equal-length
 * routes resolve the same way on every run. Unexplored exits and exits whose
 * destination is not in the map are never followed.
 */

import { sortDirections } from "@waymark/parser";
import type { Room } from "./room.js";
import type { WorldMap } from "./world-map.js";

export interface PathStep {
  direction: string;
  roomId: string;
  roomTitle: string;
}

export interface NearbyRoom {
  room: Room;
  distance: number;
}

/** Known exits of a room whose destination exists, in canonical order. */
export function knownNeighbours(map: WorldMap, room: Room): Array<{ direction: string; room: Room }> {
  const out: Array<{ direction: string; room: Room }> = [];
  for (const direction of sortDirections(room.exits.keys())) {
    const destId = room.knownDestination(direction);
    if (destId === null) continue;
    const dest = map.getRoom(destId);
    if (dest) out.push({ direction, room: dest });
  }
  return out;
}

function bfsSteps(map: WorldMap, start: string, target: string): PathStep[] | null {
  const origin = map.getRoom(start);
  if (!origin) return null;
  const queue: Array<{ room: Room; path: PathStep[] }> = [{ room: origin, path: [] }];
  const visited = new Set<string>([start]);
  for (let item = queue.shift(); item !== undefined; item = queue.shift()) {
    for (const { direction, room } of knownNeighbours(map, item.room)) {
      const newPath: PathStep[] = [...item.path, { direction, roomId: room.id, roomTitle: room.title }];
      if (room.id === target) return newPath;
      if (!visited.has(room.id)) {
        visited.add(room.id);
        queue.push({ room, path: newPath });
      }
    }
  }
  return null;
}

/**
 * Shortest route from the current room as annotated steps. [] when already
 * there; null without a current room, with an empty target, or when unreachable.
 */
export function findPathWithRooms(map: WorldMap, targetId: string): PathStep[] | null {
  const start = map.currentRoomId;
  if (!start || !targetId) return null;
  if (start === targetId) return [];
  return bfsSteps(map, start, targetId);
}

export function findPath(map: WorldMap, targetId: string): string[] | null {
  return findPathWithRooms(map, targetId)?.map((step) => step.direction) ?? null;
}

export function distanceBetween(map: WorldMap, fromId: string, toId: string): number | null {
  if (!fromId || !toId) return null;
  if (fromId === toId) return map.getRoom(fromId) ? 0 : null;
  return bfsSteps(map, fromId, toId)?.length ?? null;
}

/**
 * Rooms within maxDistance hops of the current room, nearest first, then by
 * title and room number. The current room itself is never listed.
 */
export function findNearbyRooms(map: WorldMap, maxDistance: number): NearbyRoom[] | null {
  const origin = map.currentRoom();
  if (!origin) return null;

  const distances = new Map<string, number>([[origin.id, 0]]);
  const queue: Array<{ room: Room; distance: number }> = [{ room: origin, distance: 0 }];
  const found: NearbyRoom[] = [];
  for (let item = queue.shift(); item !== undefined; item = queue.shift()) {
    if (item.distance >= maxDistance) continue;
    for (const { room } of knownNeighbours(map, item.room)) {
      if (distances.has(room.id)) continue;
      const distance = item.distance + 1;
      distances.set(room.id, distance);
      found.push({ room, distance });
      queue.push({ room, distance });
    }
  }

  return found.sort((a, b) =>
    a.distance - b.distance ||
    (a.room.title < b.room.title ? -1 : a.room.title > b.room.title ? 1 : 0) ||
    (map.getRoomNumber(a.room.id) ?? 0) - (map.getRoomNumber(b.room.id) ?? 0)
  );
}
