/**
 * Direction vocabulary shared by the parser, the mapper and the renderer.
 *
 * Full names and the diagonal abbreviations (ne, nw, se, sw) are distinct
 * direction names. The one-letter forms are aliases that expand to a full name.
 */

export const DIRECTION_ALIASES: ReadonlyMap<string, string> = new Map([
  ["n", "north"],
  ["s", "south"],
  ["e", "east"],
  ["w", "west"],
  ["u", "up"],
  ["d", "down"],
]);

const VALID_DIRECTIONS = new Set([
  "north", "south", "east", "west", "up", "down",
  "northeast", "northwest", "southeast", "southwest",
  "ne", "nw", "se", "sw",
  "n", "s", "e", "w", "u", "d",
]);

const REVERSE: ReadonlyMap<string, string> = new Map([
  ["north", "south"],
  ["south", "north"],
  ["east", "west"],
  ["west", "east"],
  ["up", "down"],
  ["down", "up"],
  ["ne", "sw"],
  ["sw", "ne"],
  ["nw", "se"],
  ["se", "nw"],
  ["northeast", "southwest"],
  ["southwest", "northeast"],
  ["northwest", "southeast"],
  ["southeast", "northwest"],
]);

/** Canonical neighbour order; anything not listed sorts after, alphabetically. */
const CANONICAL_ORDER = ["north", "south", "east", "west", "up", "down"];

export function isValidDirection(dir: string): boolean {
  return VALID_DIRECTIONS.has(dir.toLowerCase());
}

/** Lower-cases and expands one-letter aliases. Does not validate. */
export function normalizeDirection(dir: string): string {
  const lower = dir.toLowerCase();
  return DIRECTION_ALIASES.get(lower) ?? lower;
}

/** Opposite direction, or null for anything outside the fixed set. */
export function reverseDirection(dir: string): string | null {
  return REVERSE.get(normalizeDirection(dir)) ?? null;
}

function directionRank(dir: string): number {
  const idx = CANONICAL_ORDER.indexOf(normalizeDirection(dir));
  return idx === -1 ? CANONICAL_ORDER.length : idx;
}

export function compareDirections(a: string, b: string): number {
  const diff = directionRank(a) - directionRank(b);
  if (diff !== 0) return diff;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortDirections(dirs: Iterable<string>): string[] {
  return [...dirs].sort(compareDirections);
}

/** A bare direction or alias typed as a command → full direction name. */
export function detectMovement(command: string): string | null {
  const cmd = command.trim().toLowerCase();
  if (!isValidDirection(cmd)) return null;
  return normalizeDirection(cmd);
}
