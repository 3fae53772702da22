import { describe, it, expect } from "vitest";
import { v4 as uuid } from "uuid";
import {
  validateJournalEventData,
  validateMapDocumentData,
  validateConfigFileData,
} from "./validator.js";
import { WaymarkError, ErrorCodes } from "./types.js";

describe("validateJournalEventData", () => {
  const validEvent = () => ({
    event_id: uuid(),
    timestamp: new Date().toISOString(),
    session_id: uuid(),
    type: "room.discovered",
    payload: {},
  });

  it("accepts a valid event", () => {
    const result = validateJournalEventData(validEvent());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("rejects event with invalid type", () => {
    const result = validateJournalEventData({ ...validEvent(), type: "room.exploded" });
    expect(result.valid).toBe(false);
  });

  it("rejects event with invalid timestamp format", () => {
    const e = validEvent();
    e.timestamp = "not-a-date";
    const result = validateJournalEventData(e);
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain("/timestamp");
  });

  it("accepts event with hash_prev and seq", () => {
    const result = validateJournalEventData({ ...validEvent(), hash_prev: "abc123", seq: 0 });
    expect(result.valid).toBe(true);
  });

  it("rejects event with negative seq", () => {
    const result = validateJournalEventData({ ...validEvent(), seq: -1 });
    expect(result.valid).toBe(false);
  });

  it("rejects event missing required fields", () => {
    const result = validateJournalEventData({});
    expect(result.valid).toBe(false);
    expect(result.errors.length).toBeGreaterThan(0);
  });

  it("accepts auto-walk event types", () => {
    for (const type of ["autowalk.started", "autowalk.step", "autowalk.replanned", "autowalk.aborted"]) {
      const result = validateJournalEventData({ ...validEvent(), type });
      expect(result.valid).toBe(true);
    }
  });
});

describe("validateMapDocumentData", () => {
  const validDocument = () => ({
    rooms: {
      "hall|a wide hall.|north": {
        id: "hall|a wide hall.|north",
        title: "Hall",
        description: "A wide hall.",
        first_sentence: "A wide hall.",
        exits: { north: "" },
        visit_count: 1,
      },
    },
    current_room_id: "hall|a wide hall.|north",
    previous_room_id: "",
    last_direction: "",
    room_numbering: ["hall|a wide hall.|north"],
    saved_at: new Date().toISOString(),
  });

  it("accepts a valid document", () => {
    const result = validateMapDocumentData(validDocument());
    expect(result.valid).toBe(true);
  });

  it("accepts a document without room numbering", () => {
    const { room_numbering: _numbering, ...legacy } = validDocument();
    expect(validateMapDocumentData(legacy).valid).toBe(true);
  });

  it("accepts null room numbering", () => {
    expect(validateMapDocumentData({ ...validDocument(), room_numbering: null }).valid).toBe(true);
  });

  it("rejects duplicate room numbering entries", () => {
    const doc = validDocument();
    doc.room_numbering = ["a", "a"];
    expect(validateMapDocumentData(doc).valid).toBe(false);
  });

  it("rejects exits that are not strings", () => {
    const doc = validDocument();
    const room = { ...doc.rooms["hall|a wide hall.|north"], exits: { north: 3 } };
    const result = validateMapDocumentData({ ...doc, rooms: { [room.id]: room } });
    expect(result.valid).toBe(false);
  });

  it("rejects a negative visit count", () => {
    const doc = validDocument();
    const room = { ...doc.rooms["hall|a wide hall.|north"], visit_count: -1 };
    expect(validateMapDocumentData({ ...doc, rooms: { [room.id]: room } }).valid).toBe(false);
  });

  it("rejects a document missing current_room_id", () => {
    const { current_room_id: _current, ...rest } = validDocument();
    const result = validateMapDocumentData(rest);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/: must have required property 'current_room_id'"]);
  });
});

describe("validateConfigFileData", () => {
  it("accepts a partial config", () => {
    expect(validateConfigFileData({ map_dir: "/tmp/maps", map_width: 40 }).valid).toBe(true);
  });

  it("accepts an empty config", () => {
    expect(validateConfigFileData({}).valid).toBe(true);
  });

  it("rejects unknown keys", () => {
    expect(validateConfigFileData({ colour: "blue" }).valid).toBe(false);
  });

  it("rejects a non-positive width", () => {
    const result = validateConfigFileData({ map_width: 0 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/map_width: must be >= 1"]);
  });
});

describe("WaymarkError", () => {
  it("has correct code, message, and data", () => {
    const err = new WaymarkError("WRITE_FAILED", "disk full", { path: "/tmp/x" });
    expect(err.code).toBe(ErrorCodes.WRITE_FAILED);
    expect(err.message).toBe("disk full");
    expect(err.data).toEqual({ path: "/tmp/x" });
    expect(err.name).toBe("WaymarkError");
    expect(err instanceof Error).toBe(true);
  });

  it("works without data parameter", () => {
    const err = new WaymarkError("READ_FAILED", "gone");
    expect(err.data).toBeUndefined();
  });
});

describe("type guards", () => {
  it("isJournalEvent narrows valid events only", async () => {
    const { isJournalEvent } = await import("./validator.js");
    expect(isJournalEvent({ event_id: "e1", timestamp: "2024-01-01T00:00:00.000Z", session_id: "s1", type: "map.saved", payload: {} })).toBe(true);
    expect(isJournalEvent({ event_id: "e1" })).toBe(false);
  });

  it("isMapDocument rejects arrays", async () => {
    const { isMapDocument } = await import("./validator.js");
    expect(isMapDocument([])).toBe(false);
    expect(isMapDocument({ rooms: {}, current_room_id: "", previous_room_id: "", last_direction: "" })).toBe(true);
  });
});

describe("WaymarkError cause", () => {
  it("keeps the wrapped cause", () => {
    const cause = new Error("EACCES");
    const err = new WaymarkError("READ_FAILED", "cannot read", undefined, { cause });
    expect(err.cause).toBe(cause);
  });
});
