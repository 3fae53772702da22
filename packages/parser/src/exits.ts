import { isValidDirection, normalizeDirection } from "./directions.js";

// Inline compact form first: "...Exits:N(S)E>" anywhere on a prompt line.
const COMPACT_EXITS = /exits?\s*:\s*([neswud()]+)\s*>/i;

const LIST_EXITS: RegExp[] = [
  /^exits?\s*:\s*(.+)$/i,
  /^\[\s*exits?\s*:\s*(.+?)\s*\]$/i,
  /^obvious\s+exits?\s*:\s*(.+)$/i,
];

const NOISE_WORDS = new Set(["and", "or", "none"]);
const COMPACT_TOKEN = /^[neswud()]+>?$/i;

function dedupe(dirs: string[]): string[] {
  return [...new Set(dirs)];
}

/** "NSE" or "N(S)E": one direction per letter; parenthesised letters are closed doors. */
export function parseCompactExits(text: string): string[] {
  const exits: string[] = [];
  for (const ch of text) {
    if (ch === "(" || ch === ")" || ch === ">") continue;
    if (isValidDirection(ch)) exits.push(normalizeDirection(ch));
  }
  return dedupe(exits);
}

/**
 * Parses the list part of an exits line. A single token made only of
 * direction letters is compact form, one direction per letter, so "SE" is
 * south and east. Any other lone token is read as a word.
 */
export function parseExitsList(exitText: string): string[] {
  const text = exitText.trim();
  if (text === "") return [];

  if (!/[\s,]/.test(text) && COMPACT_TOKEN.test(text)) {
    return parseCompactExits(text);
  }

  const exits: string[] = [];
  for (const raw of text.replace(/,/g, " ").split(/\s+/)) {
    const word = raw.toLowerCase();
    if (word === "" || NOISE_WORDS.has(word)) continue;
    if (isValidDirection(word)) exits.push(normalizeDirection(word));
  }
  return dedupe(exits);
}

/** Directions named by an exits line; empty when the line is not one. */
export function parseExitsLine(line: string): string[] {
  const compact = COMPACT_EXITS.exec(line);
  if (compact?.[1] !== undefined) {
    const exits = parseCompactExits(compact[1]);
    if (exits.length > 0) return exits;
  }
  for (const pattern of LIST_EXITS) {
    const match = pattern.exec(line);
    if (match?.[1] !== undefined) {
      return parseExitsList(match[1]);
    }
  }
  return [];
}

export function isExitsLine(line: string): boolean {
  return parseExitsLine(line).length > 0;
}
