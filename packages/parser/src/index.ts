export { stripAnsi, cleanLine, dim, green, red, yellow, cyan, bold } from "./ansi.js";
export {
  DIRECTION_ALIASES,
  isValidDirection,
  normalizeDirection,
  reverseDirection,
  compareDirections,
  sortDirections,
  detectMovement,
} from "./directions.js";
export { parseExitsLine, parseExitsList, parseCompactExits, isExitsLine } from "./exits.js";
export { isPromptLine, isStatusLine, isRoomTitle, isFailedMove } from "./heuristics.js";
export { parseRoomInfo, type ParseOptions } from "./room-parser.js";
export { parseInventory } from "./inventory.js";
