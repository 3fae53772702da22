import { describe, it, expect } from "vitest";
import { Room } from "@waymark/mapper";
import { stripAnsi } from "@waymark/parser";
import type { JournalEvent } from "@waymark/schemas";
import {
  colorForType,
  exitSummary,
  formatJournalEvent,
  matchList,
  renderedMapLines,
  roomLine,
  truncate,
} from "./formatter.js";

function room(title: string, exits: string[]): Room {
  return Room.observed(title.toLowerCase(), title, "", exits);
}

describe("colorForType", () => {
  it("colours by outcome", () => {
    expect(colorForType("room.discovered")("x")).toBe("\x1b[32mx\x1b[0m");
    expect(colorForType("autowalk.aborted")("x")).toBe("\x1b[31mx\x1b[0m");
    expect(colorForType("map.migrated")("x")).toBe("\x1b[33mx\x1b[0m");
    expect(colorForType("map.saved")("x")).toBe("\x1b[36mx\x1b[0m");
  });
});

describe("truncate", () => {
  it("leaves short strings alone", () => {
    expect(truncate("abc", 5)).toBe("abc");
  });

  it("cuts long strings", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
  });
});

describe("exitSummary", () => {
  it("lists exits in canonical order", () => {
    expect(exitSummary(room("Crossroads", ["west", "up", "north", "east"]))).toBe("north, east, west, up");
  });

  it("says none for a room without exits", () => {
    expect(exitSummary(room("Dead End", []))).toBe("none");
  });
});

describe("roomLine", () => {
  it("numbers a room with its exits", () => {
    expect(stripAnsi(roomLine(12, room("Crossroads", ["south"])))).toBe("  12. Crossroads [south]");
  });
});

describe("matchList", () => {
  it("lists at most five candidates", () => {
    const rooms = ["One", "Two", "Three", "Four", "Five", "Six", "Seven"].map((t) => room(`Room ${t}`, []));
    expect(matchList("room", rooms, "go").map(stripAnsi)).toEqual([
      "Found 7 rooms matching 'room':",
      "  1. Room One",
      "  2. Room Two",
      "  3. Room Three",
      "  4. Room Four",
      "  5. Room Five",
      "  ... and 2 more",
      "Please be more specific, or use /go <number> to select a room.",
    ]);
  });
});

describe("renderedMapLines", () => {
  it("puts the title above the map", () => {
    expect(renderedMapLines({ text: "▣\n│", title: "Hall" }).map(stripAnsi)).toEqual(["Hall", "▣", "│"]);
  });

  it("shows only the placeholder without a current room", () => {
    expect(renderedMapLines({ text: "(exploring...)", title: "" })).toEqual(["(exploring...)"]);
  });
});

describe("formatJournalEvent", () => {
  const event = (payload: Record<string, unknown>): JournalEvent => ({
    event_id: "e1",
    timestamp: "2024-03-01T12:34:56.789Z",
    session_id: "s1",
    type: "exit.linked",
    payload,
  });

  it("shows time, type and payload", () => {
    expect(stripAnsi(formatJournalEvent(event({ direction: "north" })))).toBe('12:34:56 exit.linked {"direction":"north"}');
  });

  it("omits an empty payload", () => {
    expect(stripAnsi(formatJournalEvent(event({})))).toBe("12:34:56 exit.linked");
  });
});
