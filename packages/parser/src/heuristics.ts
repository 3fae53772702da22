const STATUS_KEYWORDS = [
  "you feel",
  "you are affected",
  "you nearly",
  "you retch",
  "points a",
  "is lying here",
  "sits here",
  "stands here",
  "plays with",
  "is here",
  "a small",
  "a large",
  "a long",
  "the corpse",
];

const TITLE_BAD_STARTS = ["you ", "the corpse", "a small", "a large", "a long"];

const FAILED_MOVE_MESSAGES = [
  "alas, you cannot go that way",
  "you can't go that way",
  "cannot go that way",
];

/** Prompts end with ">" and show hit and move counters, e.g. "26H 78V ... >". */
export function isPromptLine(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed.endsWith(">")) return false;
  return trimmed.includes("H ") && trimmed.includes("V ");
}

/** Combat, affect and NPC lines that interleave with room text. */
export function isStatusLine(line: string): boolean {
  const lower = line.toLowerCase();
  return STATUS_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function isRoomTitle(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed === "") return false;

  const lower = trimmed.toLowerCase();
  if (TITLE_BAD_STARTS.some((start) => lower.startsWith(start))) return false;

  const words = trimmed.split(/\s+/);
  if (words.length < 2 || words.length > 8) return false;

  const first = trimmed.charCodeAt(0);
  return first >= 65 && first <= 90;
}

export function isFailedMove(line: string): boolean {
  const lower = line.toLowerCase();
  return FAILED_MOVE_MESSAGES.some((msg) => lower.includes(msg));
}
