export type {
  RoomMarkers,
  RoomInfo,
  TraceFn,
  ExitTarget,
  RoomRecord,
  MapDocument,
  WaymarkConfigFile,
  JournalEventType,
  JournalEvent,
  ErrorCode,
} from "./types.js";
export { ErrorCodes, WaymarkError } from "./types.js";
export { JOURNAL_EVENT_TYPES, JournalEventSchema } from "./journal-event.schema.js";
export { MapDocumentSchema, RoomRecordSchema } from "./map-document.schema.js";
export { ConfigFileSchema } from "./config.schema.js";
export {
  validateJournalEventData,
  validateMapDocumentData,
  validateConfigFileData,
  isJournalEvent,
  isMapDocument,
  isConfigFile,
  type ValidationResult,
} from "./validator.js";
