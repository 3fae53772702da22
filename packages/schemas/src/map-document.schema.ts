export const RoomRecordSchema = {
  type: "object",
  required: ["id", "title", "description", "first_sentence", "exits", "visit_count"],
  properties: {
    id: { type: "string", minLength: 1 },
    title: { type: "string" },
    description: { type: "string" },
    first_sentence: { type: "string" },
    exits: {
      type: "object",
      additionalProperties: { type: "string" },
    },
    visit_count: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;

export const MapDocumentSchema = {
  type: "object",
  required: ["rooms", "current_room_id", "previous_room_id", "last_direction"],
  properties: {
    rooms: {
      type: "object",
      additionalProperties: RoomRecordSchema,
    },
    current_room_id: { type: "string" },
    previous_room_id: { type: "string" },
    last_direction: { type: "string" },
    room_numbering: {
      type: ["array", "null"],
      items: { type: "string", minLength: 1 },
      uniqueItems: true,
    },
    saved_at: { type: "string", format: "date-time" },
  },
  additionalProperties: false,
} as const;
