import { describe, it, expect } from "vitest";
import type { ExitTarget } from "@waymark/schemas";
import { stripAnsi } from "@waymark/parser";
import { Room } from "./room.js";
import { WorldMap } from "./world-map.js";
import { buildRoomGrid, getCell, renderGrid, renderMap, visibleRoomIds } from "./grid.js";

function room(id: string, title: string, exits: Record<string, string> = {}): Room {
  return new Room({
    id,
    title,
    description: "",
    exits: Object.entries(exits).map(([dir, dest]): [string, ExitTarget] =>
      [dir, dest === "" ? { kind: "unexplored" } : { kind: "known", roomId: dest }]
    ),
  });
}

/** A with B to the north and an unexplored exit east. */
function smallMap(): WorldMap {
  return new WorldMap({
    rooms: [room("a", "Alpha", { north: "b", east: "" }), room("b", "Beta", { south: "a" })],
    currentRoomId: "a",
    roomNumbering: ["a", "b"],
  });
}

describe("buildRoomGrid", () => {
  it("places rooms by cardinal exits and marks unexplored ones", () => {
    const map = smallMap();
    const grid = buildRoomGrid(map, map.getRoom("a") ?? room("x", "X"));
    expect(getCell(grid, 0, 0)).toMatchObject({ kind: "room", room: { id: "a" } });
    expect(getCell(grid, 0, -1)).toMatchObject({ kind: "room", room: { id: "b" } });
    expect(getCell(grid, 1, 0)).toEqual({ kind: "unexplored" });
    expect(grid.cells.size).toBe(3);
  });

  it("keeps the first claim on a coordinate", () => {
    const map = new WorldMap({
      rooms: [
        room("a", "A", { north: "c", east: "b" }),
        room("b", "B", { north: "e" }),
        room("c", "C", { east: "d" }),
        room("d", "D"),
        room("e", "E"),
      ],
      currentRoomId: "a",
    });
    const grid = buildRoomGrid(map, room("a", "A", { north: "c", east: "b" }));
    expect(getCell(grid, 1, -1)).toMatchObject({ kind: "room", room: { id: "d" } });
  });

  it("ignores vertical and diagonal exits, and missing rooms show as unexplored", () => {
    const origin = room("a", "A", { up: "b", ne: "b", w: "gone" });
    const map = new WorldMap({ rooms: [origin, room("b", "B")], currentRoomId: "a" });
    const grid = buildRoomGrid(map, origin);
    expect(getCell(grid, -1, 0)).toEqual({ kind: "unexplored" });
    expect(grid.cells.size).toBe(2);
  });
});

describe("renderGrid", () => {
  it("draws rooms, connectors and unexplored exits", () => {
    const { text } = renderMap(smallMap(), 9, 6);
    expect(text.split("\n")).toEqual([
      "   ▢   ",
      "   │   ",
      "   ▣──▦",
      "       ",
      "       ",
    ]);
  });

  it("colours the current room, unexplored cells and connectors", () => {
    const { text } = renderMap(smallMap(), 9, 6, { color: true });
    const lines = text.split("\n");
    expect(lines[2]).toBe("   \x1b[33m▣\x1b[0m\x1b[2m──\x1b[0m\x1b[2m▦\x1b[0m");
    expect(lines[1]).toBe("   \x1b[2m│\x1b[0m   ");
    expect(stripAnsi(text)).toBe(renderMap(smallMap(), 9, 6).text);
  });

  it("shows legend numbers in padded cells", () => {
    const legend = new Map([["a", 12], ["b", 3]]);
    const { text } = renderMap(smallMap(), 9, 6, { legend });
    expect(text.split("\n").slice(0, 3)).toEqual([
      "    3     ",
      "    │     ",
      "    12──▦ ",
    ]);
  });

  it("marks vertical exits when no legend is active", () => {
    const map = new WorldMap({
      rooms: [room("a", "A", { up: "", east: "b" }), room("b", "B", { up: "", down: "", west: "a" })],
      currentRoomId: "a",
    });
    expect(renderMap(map, 9, 2).text).toBe("   ⇱──⇅");
  });

  it("draws a connector when only the neighbour points back", () => {
    // b reaches (1,0) through n and m; a itself has no east exit
    const layout = (bWest: string): WorldMap => new WorldMap({
      rooms: [
        room("a", "A", { north: "n" }),
        room("n", "N", { east: "m" }),
        room("m", "M", { south: "b" }),
        room("b", "B", { west: bWest }),
        room("c", "C"),
      ],
      currentRoomId: "a",
    });
    expect(renderMap(layout("a"), 9, 2).text).toBe("   ▣──▢");
    expect(renderMap(layout("c"), 9, 2).text).toBe("   ▣  ▢");
  });

  it("lays out around any origin while marking the current room", () => {
    const map = smallMap();
    const grid = buildRoomGrid(map, map.getRoom("b") ?? room("x", "X"));
    expect(renderGrid(grid, 9, 6).split("\n")).toEqual([
      "       ",
      "       ",
      "   ▢   ",
      "   │   ",
      "   ▣──▦",
    ]);
  });

  it("renders only the origin in a tiny viewport", () => {
    expect(renderMap(smallMap(), 0, 0).text).toBe("▣");
    expect(renderMap(smallMap(), -5, -5).text).toBe("▣");
  });
});

describe("renderMap", () => {
  it("returns the current title", () => {
    expect(renderMap(smallMap(), 9, 6).title).toBe("Alpha");
  });

  it("shows a placeholder before the first room", () => {
    expect(renderMap(new WorldMap(), 30, 15)).toEqual({ text: "(exploring...)", title: "" });
  });
});

describe("visibleRoomIds", () => {
  const corridor = (): WorldMap => new WorldMap({
    rooms: [
      room("d", "D", { west: "c" }),
      room("c", "C", { east: "d", west: "b" }),
      room("b", "B", { east: "c", west: "a" }),
      room("a", "A", { east: "b" }),
    ],
    currentRoomId: "a",
    roomNumbering: ["a", "b", "c", "d"],
  });

  it("lists rooms inside the viewport in room-number order", () => {
    expect(visibleRoomIds(corridor(), 9, 2)).toEqual(["a", "b"]);
    expect(visibleRoomIds(corridor(), 15, 2)).toEqual(["a", "b", "c"]);
  });

  it("is empty without a current room", () => {
    expect(visibleRoomIds(new WorldMap(), 30, 15)).toEqual([]);
  });
});
