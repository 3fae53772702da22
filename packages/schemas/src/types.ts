/**
 * waymark core types
 *
 * Shapes shared by the parser, the mapper, the journal and the CLI.
 * Persisted shapes use snake_case keys; in-memory shapes use camelCase.
 */

// ─── Parser output ──────────────────────────────────────────────────

/** Line indices of the `--<` / `>--` marker lines of a bracketed room block. */
export interface RoomMarkers {
  start: number;
  end: number;
}

export interface RoomInfo {
  title: string;
  description: string;
  exits: string[];
  /** Present only for bracketed rooms. */
  markers?: RoomMarkers;
}

export type TraceFn = (message: string) => void;

// ─── Exits ──────────────────────────────────────────────────────────

/**
 * State of an observed exit. A direction that was never observed has no
 * entry at all in the exit map.
 */
export type ExitTarget =
  | { kind: "unexplored" }
  | { kind: "known"; roomId: string };

// ─── Persisted map document ─────────────────────────────────────────

export interface RoomRecord {
  id: string;
  title: string;
  description: string;
  first_sentence: string;
  /** direction → destination room ID, or "" when unexplored */
  exits: Record<string, string>;
  visit_count: number;
}

export interface MapDocument {
  rooms: Record<string, RoomRecord>;
  current_room_id: string;
  previous_room_id: string;
  last_direction: string;
  /** Missing in files written before durable numbering existed. */
  room_numbering?: string[] | null;
  saved_at?: string;
}

// ─── Configuration file ─────────────────────────────────────────────

export interface WaymarkConfigFile {
  map_dir?: string;
  journal_path?: string;
  map_debug?: boolean;
  map_width?: number;
  map_height?: number;
  nearby_radius?: number;
}

// ─── Journal Events ─────────────────────────────────────────────────

export type JournalEventType =
  | "session.started"
  | "session.ended"
  | "room.discovered"
  | "room.revisited"
  | "exit.linked"
  | "exit.removed"
  | "map.loaded"
  | "map.saved"
  | "map.migrated"
  | "autowalk.started"
  | "autowalk.step"
  | "autowalk.replanned"
  | "autowalk.completed"
  | "autowalk.aborted";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Errors ─────────────────────────────────────────────────────────

export const ErrorCodes = {
  INVALID_CANDIDATE: "INVALID_CANDIDATE",
  READ_FAILED: "READ_FAILED",
  PARSE_FAILED: "PARSE_FAILED",
  INVALID_DOCUMENT: "INVALID_DOCUMENT",
  WRITE_FAILED: "WRITE_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG",
  JOURNAL_CLOSED: "JOURNAL_CLOSED",
  JOURNAL_CORRUPTED: "JOURNAL_CORRUPTED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class WaymarkError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WaymarkError";
    this.code = code;
    this.data = data;
  }
}
