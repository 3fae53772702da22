import type { RoomInfo, TraceFn } from "@waymark/schemas";
import { cleanLine } from "./ansi.js";
import { isExitsLine, parseExitsLine } from "./exits.js";
import { isPromptLine, isRoomTitle, isStatusLine } from "./heuristics.js";

export interface ParseOptions {
  /** Receives human-readable parsing decisions. Never affects the result. */
  trace?: TraceFn;
}

const OPEN_MARKER = "--<";
const CLOSE_MARKER = ">--";
const MAX_BLOCK_LINES = 15;

/**
 * Extracts the most recent room from a window of received lines, or null
 * when the window holds no complete room.
 */
export function parseRoomInfo(lines: readonly string[], options?: ParseOptions): RoomInfo | null {
  const trace = options?.trace;
  if (lines.length === 0) return null;
  const clean = lines.map(cleanLine);

  const bracketed = parseBracketedRoom(clean, trace);
  if (bracketed !== undefined) return bracketed;

  // ─── Exits line ───
  let exitsIdx = -1;
  let exits: string[] = [];
  for (let i = clean.length - 1; i >= 0; i--) {
    const parsed = parseExitsLine(clean[i] ?? "");
    if (parsed.length > 0) {
      exitsIdx = i;
      exits = parsed;
      break;
    }
  }
  if (exitsIdx === -1) {
    trace?.("no exits line in window");
    return null;
  }
  trace?.(`exits line at ${exitsIdx}: ${exits.join(", ")}`);

  // ─── Room block ───
  const block: string[] = [];
  let blanks = 0;
  for (let i = exitsIdx - 1; i >= 0; i--) {
    const line = clean[i] ?? "";
    if (line === "") {
      blanks++;
      if (blanks >= 2) {
        trace?.(`stopped at two blank lines above ${i}`);
        break;
      }
      continue;
    }
    blanks = 0;
    if (isExitsLine(line)) {
      // Exits lines stacked directly on the one we found belong to it
      if (block.length === 0) continue;
      trace?.(`stopped at earlier exits line ${i}`);
      break;
    }
    if (isPromptLine(line)) {
      trace?.(`stopped at prompt line ${i}`);
      break;
    }
    if (isStatusLine(line)) {
      trace?.(`skipped status line ${i}: ${line}`);
      continue;
    }
    block.unshift(line);
    if (block.length >= MAX_BLOCK_LINES) {
      trace?.(`stopped at ${MAX_BLOCK_LINES}-line budget`);
      break;
    }
  }

  if (block.length === 0) {
    trace?.("empty room block");
    return null;
  }

  let titleIdx = block.findIndex(isRoomTitle);
  if (titleIdx === -1) {
    trace?.("no title-like line, falling back to first line");
    titleIdx = 0;
  }
  const title = block[titleIdx] ?? "";
  const description = block.slice(titleIdx + 1).join(" ");
  trace?.(`parsed room "${title}" with exits ${exits.join(", ")}`);
  return { title, description, exits };
}

/**
 * `--<` / title / description / `>-- Exits:...` blocks. Returns undefined when
 * the window holds no complete bracketed block, so plain parsing can run.
 */
function parseBracketedRoom(clean: string[], trace?: TraceFn): RoomInfo | null | undefined {
  let end = -1;
  for (let i = clean.length - 1; i >= 0; i--) {
    if ((clean[i] ?? "").startsWith(CLOSE_MARKER)) {
      end = i;
      break;
    }
  }
  if (end === -1) return undefined;

  let start = -1;
  for (let i = end - 1; i >= 0; i--) {
    if (clean[i] === OPEN_MARKER) {
      start = i;
      break;
    }
  }
  if (start === -1) {
    trace?.(`close marker at ${end} has no open marker`);
    return undefined;
  }
  trace?.(`bracketed room between ${start} and ${end}`);

  const inner = clean.slice(start + 1, end).filter((line) => line !== "");
  const title = inner[0];
  if (title === undefined) {
    trace?.("bracketed room has no title");
    return null;
  }

  let exits = parseExitsLine((clean[end] ?? "").slice(CLOSE_MARKER.length).trim());
  if (exits.length === 0) {
    for (let i = end + 1; i < clean.length; i++) {
      const line = clean[i] ?? "";
      if (line === OPEN_MARKER) break;
      const parsed = parseExitsLine(line);
      if (parsed.length > 0) {
        trace?.(`exits for bracketed room from line ${i}`);
        exits = parsed;
        break;
      }
    }
  }

  return {
    title,
    description: inner.slice(1).join(" "),
    exits,
    markers: { start, end },
  };
}
