import { readFile, mkdir, open, rename, rm } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ExitTarget, MapDocument, RoomRecord } from "@waymark/schemas";
import { isMapDocument, validateMapDocumentData } from "@waymark/schemas";
import { MapStoreError } from "./errors.js";
import { Room } from "./room.js";
import { WorldMap } from "./world-map.js";

export interface LoadResult {
  map: WorldMap;
  /** True when a file without room numbering was upgraded on load. */
  migrated: boolean;
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `<dir>/<host>_<port>.json`, with the host reduced to [A-Za-z0-9.-]. */
export function mapFilePath(dir: string, host: string, port: number): string {
  const safeHost = host.replace(/[^A-Za-z0-9.-]/g, "_");
  return join(dir, `${safeHost}_${port}.json`);
}

export function serializeMap(map: WorldMap): MapDocument {
  const rooms: Record<string, RoomRecord> = {};
  for (const room of map.allRooms()) {
    const exits: Record<string, string> = {};
    for (const [dir, exit] of room.exits) {
      exits[dir] = exit.kind === "known" ? exit.roomId : "";
    }
    rooms[room.id] = {
      id: room.id,
      title: room.title,
      description: room.description,
      first_sentence: room.firstSentence,
      exits,
      visit_count: room.visitCount,
    };
  }
  return {
    rooms,
    current_room_id: map.currentRoomId,
    previous_room_id: map.previousRoomId,
    last_direction: map.lastDirection,
    room_numbering: [...map.roomNumbering],
    saved_at: new Date().toISOString(),
  };
}

export function deserializeMap(doc: MapDocument): WorldMap {
  const rooms = Object.values(doc.rooms).map((record) => new Room({
    id: record.id,
    title: record.title,
    description: record.description,
    firstSentence: record.first_sentence,
    exits: Object.entries(record.exits).map(([dir, dest]): [string, ExitTarget] =>
      [dir, dest === "" ? { kind: "unexplored" } : { kind: "known", roomId: dest }]
    ),
    visitCount: record.visit_count,
  }));
  return new WorldMap({
    rooms,
    currentRoomId: doc.current_room_id,
    previousRoomId: doc.previous_room_id,
    lastDirection: doc.last_direction,
    roomNumbering: doc.room_numbering ?? [],
  });
}

/**
 * One JSON map file per game server. Saves are atomic: temp file, fsync,
 * rename. A failed save leaves the previous file in place.
 */
export class MapStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<LoadResult> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return { map: new WorldMap(), migrated: false };
      throw new MapStoreError("READ_FAILED", this.filePath, `Failed to read map file: ${errorMessage(err)}`, err);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw new MapStoreError("PARSE_FAILED", this.filePath, `Failed to parse map file: ${errorMessage(err)}`, err);
    }

    if (!isMapDocument(data)) {
      const { errors } = validateMapDocumentData(data);
      throw new MapStoreError("INVALID_DOCUMENT", this.filePath, `Invalid map file: ${errors.join(", ")}`);
    }

    const map = deserializeMap(data);
    const migrated = (data.room_numbering ?? []).length === 0 && map.roomCount > 0;
    if (migrated) {
      try {
        await this.save(map);
      } catch (err) {
        console.warn(`[map-store] failed to save migrated map:`, errorMessage(err));
      }
    }
    return { map, migrated };
  }

  async save(map: WorldMap): Promise<void> {
    const content = JSON.stringify(serializeMap(map), null, 2) + "\n";
    const tmpPath = this.filePath + ".tmp";
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const fh = await open(tmpPath, "w");
      try {
        await fh.writeFile(content, "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        console.warn(`[map-store] could not remove ${tmpPath}:`, errorMessage(rmErr));
      });
      throw new MapStoreError("WRITE_FAILED", this.filePath, `Failed to write map file: ${errorMessage(err)}`, err);
    }
  }
}
