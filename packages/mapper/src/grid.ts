/**
 * Text rendering of the neighbourhood around a room.
 *
 * Layout walks known exits breadth-first from the origin at (0,0). Only the
 * four cardinal directions move on the grid: north is y-1, south y+1, east
 * x+1, west x-1. A coordinate keeps whatever claimed it first.
 */

import { dim, normalizeDirection, sortDirections, yellow } from "@waymark/parser";
import type { Room } from "./room.js";
import type { WorldMap } from "./world-map.js";

export type GridCell =
  | { kind: "room"; room: Room }
  | { kind: "unexplored" };

export interface RoomGrid {
  cells: Map<string, GridCell>;
  currentRoomId: string;
}

export interface RenderOptions {
  /** room ID → number shown in place of the room glyph */
  legend?: ReadonlyMap<string, number>;
  color?: boolean;
}

export interface RenderedMap {
  text: string;
  title: string;
}

const GLYPH_CURRENT = "▣";
const GLYPH_ROOM = "▢";
const GLYPH_UNEXPLORED = "▦";
const GLYPH_UP_DOWN = "⇅";
const GLYPH_UP = "⇱";
const GLYPH_DOWN = "⇲";
const H_CONNECTOR = "──";
const V_CONNECTOR = "│";

const STEP: Readonly<Record<string, readonly [number, number]>> = {
  north: [0, -1],
  south: [0, 1],
  east: [1, 0],
  west: [-1, 0],
};

function key(x: number, y: number): string {
  return `${x},${y}`;
}

export function getCell(grid: RoomGrid, x: number, y: number): GridCell | undefined {
  return grid.cells.get(key(x, y));
}

export function buildRoomGrid(map: WorldMap, origin: Room): RoomGrid {
  const cells = new Map<string, GridCell>([[key(0, 0), { kind: "room", room: origin }]]);
  const visited = new Set<string>([origin.id]);
  const queue: Array<{ room: Room; x: number; y: number }> = [{ room: origin, x: 0, y: 0 }];

  for (let item = queue.shift(); item !== undefined; item = queue.shift()) {
    for (const direction of sortDirections(item.room.exits.keys())) {
      const step = STEP[normalizeDirection(direction)];
      if (!step) continue;
      const x = item.x + step[0];
      const y = item.y + step[1];
      const k = key(x, y);
      if (cells.has(k)) continue;

      const destId = item.room.knownDestination(direction);
      const dest = destId === null ? undefined : map.getRoom(destId);
      if (!dest) {
        cells.set(k, { kind: "unexplored" });
        continue;
      }
      cells.set(k, { kind: "room", room: dest });
      if (!visited.has(dest.id)) {
        visited.add(dest.id);
        queue.push({ room: dest, x, y });
      }
    }
  }

  return { cells, currentRoomId: map.currentRoomId };
}

function hasExit(room: Room, direction: string): boolean {
  for (const dir of room.exits.keys()) {
    if (normalizeDirection(dir) === direction) return true;
  }
  return false;
}

/** True when `from` has an exit `direction` that points at `to` (or `to` is unexplored). */
function agrees(from: GridCell, direction: string, to: GridCell): boolean {
  if (from.kind !== "room") return false;
  for (const [dir, exit] of from.room.exits) {
    if (normalizeDirection(dir) !== direction) continue;
    if (to.kind === "unexplored") return true;
    if (exit.kind === "known" && exit.roomId === to.room.id) return true;
  }
  return false;
}

function connected(a: GridCell | undefined, forward: string, b: GridCell | undefined, backward: string): boolean {
  if (!a || !b) return false;
  return agrees(a, forward, b) || agrees(b, backward, a);
}

function cellWidthFor(legend: ReadonlyMap<string, number> | undefined): number {
  if (!legend || legend.size === 0) return 1;
  return String(Math.max(...legend.values())).length;
}

interface Viewport {
  cellWidth: number;
  halfWidth: number;
  halfHeight: number;
}

function viewport(width: number, height: number, options?: RenderOptions): Viewport {
  const cellWidth = cellWidthFor(options?.legend);
  const pitch = cellWidth + 2;
  return {
    cellWidth,
    halfWidth: Math.max(0, Math.floor(Math.floor(width / pitch) / 2)),
    halfHeight: Math.max(0, Math.floor(Math.floor(height / 2) / 2)),
  };
}

function roomGlyph(grid: RoomGrid, room: Room, legend: ReadonlyMap<string, number> | undefined): string {
  const isCurrent = room.id === grid.currentRoomId;
  if (legend && legend.size > 0) {
    const n = legend.get(room.id);
    if (n !== undefined) return String(n);
    return isCurrent ? GLYPH_CURRENT : GLYPH_ROOM;
  }
  const up = hasExit(room, "up");
  const down = hasExit(room, "down");
  if (up && down) return GLYPH_UP_DOWN;
  if (up) return GLYPH_UP;
  if (down) return GLYPH_DOWN;
  return isCurrent ? GLYPH_CURRENT : GLYPH_ROOM;
}

/**
 * Fixed-size text for the grid: room rows alternate with connector rows.
 * Never throws; a tiny viewport shows only the origin.
 */
export function renderGrid(grid: RoomGrid, width: number, height: number, options?: RenderOptions): string {
  const { cellWidth, halfWidth, halfHeight } = viewport(width, height, options);
  const color = options?.color ?? false;
  const paint = (s: string, style: (v: string) => string): string => (color ? style(s) : s);
  const pad = (s: string): string => " ".repeat(Math.max(0, cellWidth - s.length));

  const lines: string[] = [];
  for (let y = -halfHeight; y <= halfHeight; y++) {
    let roomLine = "";
    let connLine = "";
    for (let x = -halfWidth; x <= halfWidth; x++) {
      const cell = getCell(grid, x, y);
      let glyph = " ";
      let styled = " ";
      if (cell?.kind === "unexplored") {
        glyph = GLYPH_UNEXPLORED;
        styled = paint(glyph, dim);
      } else if (cell?.kind === "room") {
        glyph = roomGlyph(grid, cell.room, options?.legend);
        styled = cell.room.id === grid.currentRoomId ? paint(glyph, yellow) : glyph;
      }
      roomLine += styled + pad(glyph);

      if (x < halfWidth) {
        const linked = connected(cell, "east", getCell(grid, x + 1, y), "west");
        roomLine += linked ? paint(H_CONNECTOR, dim) : "  ";
      }

      if (y < halfHeight) {
        const linked = connected(cell, "south", getCell(grid, x, y + 1), "north");
        connLine += (linked ? paint(V_CONNECTOR, dim) : " ") + " ".repeat(cellWidth - 1);
        if (x < halfWidth) connLine += "  ";
      }
    }
    lines.push(roomLine);
    if (y < halfHeight) lines.push(connLine);
  }
  return lines.join("\n");
}

export function renderMap(map: WorldMap, width: number, height: number, options?: RenderOptions): RenderedMap {
  const current = map.currentRoom();
  if (!current) return { text: "(exploring...)", title: "" };
  return { text: renderGrid(buildRoomGrid(map, current), width, height, options), title: current.title };
}

/** IDs of rooms drawn inside the viewport, in durable-number order. */
export function visibleRoomIds(map: WorldMap, width: number, height: number, options?: RenderOptions): string[] {
  const current = map.currentRoom();
  if (!current) return [];
  const grid = buildRoomGrid(map, current);
  const { halfWidth, halfHeight } = viewport(width, height, options);

  const ids = new Set<string>();
  for (let y = -halfHeight; y <= halfHeight; y++) {
    for (let x = -halfWidth; x <= halfWidth; x++) {
      const cell = getCell(grid, x, y);
      if (cell?.kind === "room") ids.add(cell.room.id);
    }
  }
  return [...ids].sort((a, b) => (map.getRoomNumber(a) ?? Number.MAX_SAFE_INTEGER) - (map.getRoomNumber(b) ?? Number.MAX_SAFE_INTEGER));
}
