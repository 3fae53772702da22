// Pure formatting functions for the mapper CLI. No side effects.

import { bold, cyan, dim, green, red, sortDirections, yellow } from "@waymark/parser";
import type { PathStep, RenderedMap, Room, WorldMap } from "@waymark/mapper";
import type { JournalEvent } from "@waymark/schemas";

/** Ambiguous searches list at most this many candidates. */
export const MAX_LISTED_MATCHES = 5;

export const errorLine = (s: string): string => red(s);
export const noticeLine = (s: string): string => yellow(s);
export const successLine = (s: string): string => green(s);

export function colorForType(type: string): (s: string) => string {
  if (type.includes("completed") || type.includes("discovered")) return green;
  if (type.includes("aborted") || type.includes("removed")) return red;
  if (type.includes("replanned") || type.includes("migrated")) return yellow;
  return cyan;
}

export function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}...` : s;
}

export function exitSummary(room: Room): string {
  const dirs = sortDirections(room.exits.keys());
  return dirs.length > 0 ? dirs.join(", ") : "none";
}

export function roomLine(n: number, room: Room): string {
  return `  ${cyan(`${n}. ${room.title}`)} ${dim(`[${exitSummary(room)}]`)}`;
}

/** Candidates of an ambiguous search, numbered by position. */
export function matchList(query: string, rooms: readonly Room[], command: string): string[] {
  const lines = [noticeLine(`Found ${rooms.length} rooms matching '${query}':`)];
  rooms.slice(0, MAX_LISTED_MATCHES).forEach((room, i) => {
    lines.push(`  ${cyan(`${i + 1}. ${room.title}`)}`);
  });
  if (rooms.length > MAX_LISTED_MATCHES) {
    lines.push(`  ${dim(`... and ${rooms.length - MAX_LISTED_MATCHES} more`)}`);
  }
  lines.push(noticeLine(`Please be more specific, or use /${command} <number> to select a room.`));
  return lines;
}

export function pathLines(title: string, steps: readonly PathStep[]): string[] {
  return [
    successLine(`Path to '${title}' (${steps.length} steps):`),
    ...steps.map((step, i) => `  ${cyan(`${i + 1}. ${step.direction} -> ${step.roomTitle}`)}`),
  ];
}

export function mapInfoLines(map: WorldMap): string[] {
  const lines = [successLine("=== Map Information ==="), `Total rooms explored: ${cyan(String(map.roomCount))}`];
  const current = map.currentRoom();
  if (!current) {
    lines.push(dim("No current room detected yet"));
    return lines;
  }
  lines.push(`Current room: ${cyan(current.title)}`);
  if (current.exits.size > 0) lines.push(`Exits: ${cyan(exitSummary(current))}`);
  return lines;
}

export function renderedMapLines(rendered: RenderedMap): string[] {
  const body = rendered.text.split("\n");
  return rendered.title ? [bold(rendered.title), ...body] : body;
}

export function formatJournalEvent(event: JournalEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 8) ?? "";
  const prefix = `${dim(ts)} ${colorForType(event.type)(event.type)}`;
  if (Object.keys(event.payload).length === 0) return prefix;
  return `${prefix} ${dim(truncate(JSON.stringify(event.payload), 120))}`;
}

export function helpLines(): string[] {
  return [
    successLine("=== Client Commands ==="),
    `  ${cyan("/point <room>")}      - Show the next direction to a room`,
    `  ${cyan("/wayfind <room>")}    - Show the full path to a room`,
    `  ${cyan("/go <room>")}         - Auto-walk to a room (/go again to cancel)`,
    `  ${cyan("/map")}               - Show map information`,
    `  ${cyan("/rooms [filter]")}    - List known rooms by number`,
    `  ${cyan("/nearby")}            - Number the rooms near you on the map`,
    `  ${cyan("/legend")}            - Number every room on the map`,
    `  ${cyan("/help")}              - Show this help`,
    "",
    dim("Room search matches every term against title, first sentence and exits."),
    dim("A number selects from the map legend, then room numbers, then the last search."),
  ];
}
