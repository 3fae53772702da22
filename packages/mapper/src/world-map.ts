import { reverseDirection } from "@waymark/parser";
import type { TraceFn } from "@waymark/schemas";
import { MapperError } from "./errors.js";
import { Room } from "./room.js";
import { contentSignature, generateRoomId } from "./room-identity.js";
import { distanceBetween } from "./pathfinder.js";

/** An observed room as produced by the parser. */
export interface RoomCandidate {
  title: string;
  description: string;
  exits: readonly string[];
}

export interface WorldMapState {
  rooms: Iterable<Room>;
  currentRoomId?: string;
  previousRoomId?: string;
  lastDirection?: string;
  roomNumbering?: readonly string[];
}

export type MergeOutcome = "discovered" | "revisited";

export interface MergeResult {
  room: Room;
  outcome: MergeOutcome;
  /** Direction linked from the previous room, if any. */
  linked?: string;
}

/**
 * The room/exit graph of one game world. Owns every Room; all cross
 * references are room IDs. Empty strings mean "unset".
 */
export class WorldMap {
  private rooms = new Map<string, Room>();
  private numbering: string[] = [];
  currentRoomId = "";
  previousRoomId = "";
  lastDirection = "";
  private trace?: TraceFn;

  constructor(state?: WorldMapState, options?: { trace?: TraceFn }) {
    this.trace = options?.trace;
    if (!state) return;
    for (const room of state.rooms) this.rooms.set(room.id, room);
    this.currentRoomId = state.currentRoomId ?? "";
    this.previousRoomId = state.previousRoomId ?? "";
    this.lastDirection = state.lastDirection ?? "";
    for (const id of state.roomNumbering ?? []) this.addToNumbering(id);
    // Every room gets a number; unnumbered ones follow in ID order
    for (const id of [...this.rooms.keys()].sort()) this.addToNumbering(id);
  }

  get roomCount(): number {
    return this.rooms.size;
  }

  get roomNumbering(): readonly string[] {
    return this.numbering;
  }

  allRooms(): Room[] {
    return [...this.rooms.values()];
  }

  getRoom(id: string): Room | undefined {
    return this.rooms.get(id);
  }

  currentRoom(): Room | undefined {
    return this.currentRoomId ? this.rooms.get(this.currentRoomId) : undefined;
  }

  /** 1-based durable number, or null for IDs never numbered. */
  getRoomNumber(id: string): number | null {
    const idx = this.numbering.indexOf(id);
    return idx === -1 ? null : idx + 1;
  }

  getRoomByNumber(n: number): Room | undefined {
    if (!Number.isInteger(n) || n < 1) return undefined;
    const id = this.numbering[n - 1];
    return id === undefined ? undefined : this.rooms.get(id);
  }

  setLastDirection(direction: string): void {
    this.lastDirection = direction;
  }

  /** Rooms whose title, first sentence and exits contain every query term, by room number. */
  findRooms(query: string): Room[] {
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
    if (terms.length === 0) return [];
    return this.numberedRooms().filter((room) => room.matchesSearch(terms));
  }

  /** Rooms in durable-number order. */
  numberedRooms(): Room[] {
    const out: Room[] = [];
    for (const id of this.numbering) {
      const room = this.rooms.get(id);
      if (room) out.push(room);
    }
    return out;
  }

  /**
   * Forgets an exit of the current room, e.g. after the server refused the
   * move. Returns false when there was nothing to remove.
   */
  removeExit(direction: string): boolean {
    const room = this.currentRoom();
    if (!room) return false;
    const removed = room.removeExit(direction);
    if (removed) this.trace?.(`removed exit ${direction} from ${room.id}`);
    return removed;
  }

  addOrUpdateRoom(candidate: RoomCandidate): Room {
    return this.mergeRoom(candidate).room;
  }

  /** addOrUpdateRoom, also reporting whether the room was new and what got linked. */
  mergeRoom(candidate: RoomCandidate): MergeResult {
    const title = candidate.title.trim();
    if (title === "") {
      throw new MapperError("Room candidate has a blank title", { description: candidate.description });
    }
    const exits = [...new Set(candidate.exits)];
    const signature = generateRoomId(title, candidate.description, exits);
    const current = this.currentRoom();

    let resolved = this.followKnownExit(current, signature);
    let outcome: MergeOutcome = "revisited";
    if (resolved) {
      this.trace?.(`revisit via known exit ${this.lastDirection}: ${resolved.id}`);
    } else {
      const distance = this.candidateDistance(current);
      const id = generateRoomId(title, candidate.description, exits, distance);
      const existing = this.rooms.get(id);
      if (existing) {
        resolved = existing;
        this.trace?.(`revisit by id: ${id}`);
      } else {
        resolved = Room.observed(id, title, candidate.description, exits);
        this.rooms.set(id, resolved);
        this.addToNumbering(id);
        outcome = "discovered";
        this.trace?.(`new room #${this.numbering.length}: ${id}`);
      }
    }

    if (outcome === "revisited") {
      resolved.visitCount++;
      for (const dir of exits) resolved.addExit(dir);
    }

    let linked: string | undefined;
    if (current && this.lastDirection && current.id !== resolved.id) {
      current.linkExit(this.lastDirection, resolved.id);
      linked = this.lastDirection;
      const reverse = reverseDirection(this.lastDirection);
      if (reverse !== null) {
        const recorded = resolved.knownDestination(reverse);
        if (recorded === null || recorded === current.id) {
          resolved.linkExit(reverse, current.id);
        }
      }
    }

    this.previousRoomId = this.currentRoomId;
    this.currentRoomId = resolved.id;
    return { room: resolved, outcome, linked };
  }

  private followKnownExit(current: Room | undefined, signature: string): Room | undefined {
    if (!current || !this.lastDirection) return undefined;
    const destId = current.knownDestination(this.lastDirection);
    if (destId === null) return undefined;
    const dest = this.rooms.get(destId);
    if (!dest || contentSignature(dest.id) !== signature) return undefined;
    return dest;
  }

  /**
   * Distance from room one to the room being entered. Undefined when it
   * cannot be resolved, in which case the ID carries no distance.
   */
  private candidateDistance(current: Room | undefined): number | undefined {
    const origin = this.numbering[0];
    if (origin === undefined) return current ? undefined : 0;
    if (!current) return undefined;
    const distance = distanceBetween(this, current.id, origin);
    if (distance === null) return undefined;
    return this.lastDirection ? distance + 1 : distance;
  }

  private addToNumbering(id: string): void {
    if (!this.numbering.includes(id)) this.numbering.push(id);
  }
}
