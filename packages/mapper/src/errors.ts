import { WaymarkError, type ErrorCode } from "@waymark/schemas";

export class MapperError extends WaymarkError {
  constructor(message: string, data?: Record<string, unknown>) {
    super("INVALID_CANDIDATE", message, data);
    this.name = "MapperError";
  }
}

export type MapStoreErrorCode = Extract<ErrorCode, "READ_FAILED" | "PARSE_FAILED" | "INVALID_DOCUMENT" | "WRITE_FAILED">;

export class MapStoreError extends WaymarkError {
  readonly path: string;

  constructor(code: MapStoreErrorCode, path: string, message: string, cause?: unknown) {
    super(code, message, { path }, { cause });
    this.name = "MapStoreError";
    this.path = path;
  }
}
