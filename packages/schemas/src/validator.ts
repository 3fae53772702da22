import AjvModule, { type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";
import { JournalEventSchema } from "./journal-event.schema.js";
import { MapDocumentSchema } from "./map-document.schema.js";
import { ConfigFileSchema } from "./config.schema.js";
import type { JournalEvent, MapDocument, WaymarkConfigFile } from "./types.js";

// Both packages are CommonJS; under NodeNext the constructor sits on .default.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validateJournalEvent = ajv.compile<JournalEvent>(JournalEventSchema);
const validateMapDocument = ajv.compile<MapDocument>(MapDocumentSchema);
const validateConfigFile = ajv.compile<WaymarkConfigFile>(ConfigFileSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

export function validateMapDocumentData(data: unknown): ValidationResult {
  const valid = validateMapDocument(data);
  return toResult(valid, validateMapDocument.errors);
}

export function validateConfigFileData(data: unknown): ValidationResult {
  const valid = validateConfigFile(data);
  return toResult(valid, validateConfigFile.errors);
}

export function isJournalEvent(data: unknown): data is JournalEvent {
  return validateJournalEvent(data);
}

export function isMapDocument(data: unknown): data is MapDocument {
  return validateMapDocument(data);
}

export function isConfigFile(data: unknown): data is WaymarkConfigFile {
  return validateConfigFile(data);
}
