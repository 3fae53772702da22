export const ConfigFileSchema = {
  type: "object",
  properties: {
    map_dir: { type: "string", minLength: 1 },
    journal_path: { type: "string", minLength: 1 },
    map_debug: { type: "boolean" },
    map_width: { type: "integer", minimum: 1 },
    map_height: { type: "integer", minimum: 1 },
    nearby_radius: { type: "integer", minimum: 1 },
  },
  additionalProperties: false,
} as const;
