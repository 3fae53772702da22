import { cleanLine } from "./ansi.js";
import { isPromptLine } from "./heuristics.js";

const INVENTORY_HEADER = /^you are carrying:\s*$/i;

/**
 * Items listed under the last "You are carrying:" header. Null until the
 * prompt that ends the listing has arrived.
 */
export function parseInventory(lines: readonly string[]): string[] | null {
  const clean = lines.map(cleanLine);

  let header = -1;
  for (let i = clean.length - 1; i >= 0; i--) {
    if (INVENTORY_HEADER.test(clean[i] ?? "")) {
      header = i;
      break;
    }
  }
  if (header === -1) return null;

  const promptOffset = clean.slice(header + 1).findIndex(isPromptLine);
  if (promptOffset === -1) return null;

  return clean.slice(header + 1, header + 1 + promptOffset).filter((line) => line !== "");
}
