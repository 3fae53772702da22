const SENTENCE_ENDS = [". ", "! ", "? "];

/**
 * Text up to and including the first ". ", else the first "! ", else the
 * first "? ", else the first line. Terminators are tried in that order, not by
 * position.
 */
export function extractFirstSentence(text: string): string {
  const trimmed = text.trim();
  if (trimmed === "") return "";

  for (const terminator of SENTENCE_ENDS) {
    const idx = trimmed.indexOf(terminator);
    if (idx !== -1) return trimmed.slice(0, idx + 1).trim();
  }

  const newline = trimmed.indexOf("\n");
  if (newline !== -1) return trimmed.slice(0, newline).trim();
  return trimmed;
}

/**
 * `title|first sentence|sorted,exits[|distance]`, lower-cased. Exit order
 * never changes the result; distance does.
 */
export function generateRoomId(
  title: string,
  description: string,
  exits: readonly string[],
  distance?: number,
): string {
  const sorted = [...exits].sort();
  const id = `${title.toLowerCase()}|${extractFirstSentence(description).toLowerCase()}|${sorted.join(",")}`;
  return distance === undefined ? id : `${id}|${distance}`;
}

/** The ID without its trailing distance component. */
export function contentSignature(id: string): string {
  return id.replace(/\|\d+$/, "");
}
