export { Room, type RoomInit } from "./room.js";
export { generateRoomId, extractFirstSentence, contentSignature } from "./room-identity.js";
export {
  WorldMap,
  type RoomCandidate,
  type WorldMapState,
  type MergeOutcome,
  type MergeResult,
} from "./world-map.js";
export {
  findPath,
  findPathWithRooms,
  findNearbyRooms,
  distanceBetween,
  knownNeighbours,
  type PathStep,
  type NearbyRoom,
} from "./pathfinder.js";
export {
  buildRoomGrid,
  renderGrid,
  renderMap,
  visibleRoomIds,
  getCell,
  type GridCell,
  type RoomGrid,
  type RenderOptions,
  type RenderedMap,
} from "./grid.js";
export { MapStore, mapFilePath, serializeMap, deserializeMap, type LoadResult } from "./map-store.js";
export { MapperError, MapStoreError, type MapStoreErrorCode } from "./errors.js";
