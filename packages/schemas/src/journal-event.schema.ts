export const JOURNAL_EVENT_TYPES = [
  "session.started", "session.ended",
  "room.discovered", "room.revisited",
  "exit.linked", "exit.removed",
  "map.loaded", "map.saved", "map.migrated",
  "autowalk.started", "autowalk.step", "autowalk.replanned",
  "autowalk.completed", "autowalk.aborted",
] as const;

export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "session_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    session_id: { type: "string", minLength: 1 },
    type: { type: "string", enum: JOURNAL_EVENT_TYPES },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
