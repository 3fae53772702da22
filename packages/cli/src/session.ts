/**
 * MapperSession drives a WorldMap from the text stream of one game
 * connection.
 *
 * Player commands arm a pending movement (or an in-place refresh); server
 * output accumulates in a rolling window and is parsed once a room block is
 * complete. Lines starting with "/" are handled locally and answered through
 * the injected writer. Auto-walk hands out one direction at a time and
 * replans to the same room ID when the server refuses a move.
 */

import {
  cleanLine,
  detectMovement,
  isFailedMove,
  parseRoomInfo,
  stripAnsi,
} from "@waymark/parser";
import {
  findNearbyRooms,
  findPath,
  findPathWithRooms,
  renderMap,
  visibleRoomIds,
  type RenderedMap,
  type Room,
  type WorldMap,
} from "@waymark/mapper";
import type { JournalEvent, JournalEventType, RoomInfo, TraceFn } from "@waymark/schemas";
import {
  errorLine,
  helpLines,
  mapInfoLines,
  matchList,
  noticeLine,
  pathLines,
  roomLine,
  successLine,
} from "./formatter.js";

// ─── DI Interfaces ───────────────────────────────────────────────

/** Where client command output goes. */
export interface SessionWriter {
  write(line: string): void;
}

export class ConsoleSessionWriter implements SessionWriter {
  private color: boolean;

  constructor(color = process.stdout.isTTY === true) {
    this.color = color;
  }

  write(line: string): void {
    console.log(this.color ? line : stripAnsi(line));
  }
}

/** The part of the journal a session records to. */
export interface SessionJournal {
  tryEmit(sessionId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent | null>;
}

// ─── Data Types ──────────────────────────────────────────────────

export interface MapperSessionOptions {
  map: WorldMap;
  writer: SessionWriter;
  journal?: SessionJournal;
  sessionId?: string;
  /** Max hops listed by /nearby. Default 5. */
  nearbyRadius?: number;
  /** Map viewport used for rendering and /nearby, /legend visibility. Default 30 × 15. */
  viewport?: { width: number; height: number };
  trace?: TraceFn;
}

export interface AutoWalkState {
  targetId: string;
  targetTitle: string;
  path: string[];
  index: number;
}

export const WINDOW_LINES = 30;
export const DEFAULT_NEARBY_RADIUS = 5;
export const DEFAULT_VIEWPORT = { width: 30, height: 15 } as const;

const REFRESH_COMMANDS = new Set(["look", "l"]);

type PendingAction = { kind: "move"; direction: string } | { kind: "refresh" };

// ─── MapperSession ───────────────────────────────────────────────

export class MapperSession {
  readonly map: WorldMap;
  private writer: SessionWriter;
  private journal?: SessionJournal;
  private sessionId: string;
  private nearbyRadius: number;
  private viewport: { width: number; height: number };
  private trace?: TraceFn;

  private window: string[] = [];
  private linesSinceCommand = 0;
  private pending: PendingAction | null = null;
  private skipNextRoom = false;
  private walk: AutoWalkState | null = null;
  private legend = new Map<string, number>();
  private lastSearch: Room[] = [];
  private dirty = false;

  constructor(options: MapperSessionOptions) {
    this.map = options.map;
    this.writer = options.writer;
    this.journal = options.journal;
    this.sessionId = options.sessionId ?? "local";
    this.nearbyRadius = options.nearbyRadius ?? DEFAULT_NEARBY_RADIUS;
    this.viewport = options.viewport ?? { ...DEFAULT_VIEWPORT };
    this.trace = options.trace;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  markSaved(): void {
    this.dirty = false;
  }

  get pendingMovement(): string | null {
    return this.pending?.kind === "move" ? this.pending.direction : null;
  }

  get autoWalk(): Readonly<AutoWalkState> | null {
    return this.walk;
  }

  get activeLegend(): ReadonlyMap<string, number> {
    return this.legend;
  }

  /** The map around the current room, numbered by the active legend. */
  renderMap(color = false): RenderedMap {
    return renderMap(this.map, this.viewport.width, this.viewport.height, { legend: this.legend, color });
  }

  // ─── Input ───────────────────────────────────────────────────

  async handleCommand(command: string): Promise<void> {
    const trimmed = command.trim();
    if (trimmed.startsWith("/")) {
      await this.handleClientCommand(trimmed);
      return;
    }
    const direction = detectMovement(trimmed);
    if (direction !== null) {
      this.armPending({ kind: "move", direction });
      this.legend = new Map();
      return;
    }
    if (REFRESH_COMMANDS.has(trimmed.toLowerCase())) {
      this.armPending({ kind: "refresh" });
    }
  }

  async handleOutput(text: string): Promise<void> {
    const lines = text.split(/\r?\n/);
    if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();

    for (const line of lines) {
      this.window.push(line);
      if (this.window.length > WINDOW_LINES) this.window.shift();
      this.linesSinceCommand++;

      const clean = cleanLine(line);
      if (clean.toLowerCase().includes("recall")) {
        this.skipNextRoom = true;
        this.trace?.("recall detected, next room will not be linked");
      }
      if (isFailedMove(clean)) {
        await this.handleFailedMove();
      }
    }

    if (this.pending !== null) await this.detectRoom();
  }

  // ─── Room detection ──────────────────────────────────────────

  private armPending(action: PendingAction): void {
    this.pending = action;
    this.linesSinceCommand = 0;
  }

  private async detectRoom(): Promise<void> {
    const pending = this.pending;
    if (pending === null) return;

    if (this.skipNextRoom) {
      this.skipNextRoom = false;
      this.pending = null;
      this.trace?.("skipped room detection after recall");
      return;
    }

    const recent = this.window.slice(-Math.min(this.linesSinceCommand, WINDOW_LINES));
    const info = parseRoomInfo(recent, { trace: this.trace });
    if (info === null) return;

    this.pending = null;
    await this.mergeRoom(info, pending.kind === "move" ? pending.direction : "");
  }

  private async mergeRoom(info: RoomInfo, direction: string): Promise<void> {
    const previousId = this.map.currentRoomId;
    this.map.setLastDirection(direction);
    const { room, outcome, linked } = this.map.mergeRoom(info);
    this.dirty = true;

    if (outcome === "discovered") {
      await this.record("room.discovered", { room_id: room.id, number: this.map.getRoomNumber(room.id), title: room.title });
    } else {
      await this.record("room.revisited", { room_id: room.id, visit_count: room.visitCount });
    }
    if (linked !== undefined) {
      await this.record("exit.linked", { from: previousId, direction: linked, to: room.id });
    }

    if (this.walk && room.id === this.walk.targetId) {
      const target = this.walk.targetTitle;
      this.walk = null;
      this.writer.write(successLine(`Arrived at '${target}'.`));
      await this.record("autowalk.completed", { target_id: room.id });
    }
  }

  private async handleFailedMove(): Promise<void> {
    const direction = this.pendingMovement;
    this.pending = null;
    if (direction === null) return;

    const current = this.map.currentRoom();
    if (current && this.map.removeExit(direction)) {
      this.dirty = true;
      await this.record("exit.removed", { room_id: current.id, direction });
    }

    const walk = this.walk;
    if (!walk) return;

    this.writer.write(errorLine(`[Auto-walk: cannot go ${direction}]`));
    const path = findPath(this.map, walk.targetId);
    if (path === null) {
      this.walk = null;
      this.writer.write(errorLine(`[Auto-walk: no route left to '${walk.targetTitle}']`));
      await this.record("autowalk.aborted", { target_id: walk.targetId, reason: "no_path" });
      return;
    }
    if (path.length === 0) {
      this.walk = null;
      await this.record("autowalk.completed", { target_id: walk.targetId });
      return;
    }
    this.walk = { ...walk, path, index: 0 };
    this.writer.write(noticeLine(`[Auto-walk: new route to '${walk.targetTitle}' (${path.length} steps)]`));
    await this.record("autowalk.replanned", { target_id: walk.targetId, steps: path.length });
  }

  // ─── Auto-walk ───────────────────────────────────────────────

  /** Plans a walk to the room. Returns the path, or null when unreachable. */
  async startAutoWalk(targetId: string): Promise<string[] | null> {
    const target = this.map.getRoom(targetId);
    const path = findPath(this.map, targetId);
    if (!target || path === null) return null;
    if (path.length === 0) {
      this.walk = null;
      return path;
    }
    this.walk = { targetId, targetTitle: target.title, path, index: 0 };
    await this.record("autowalk.started", { target_id: targetId, steps: path.length });
    return path;
  }

  /** Next direction to send, armed as the pending movement; null when the walk is over. */
  async nextStep(): Promise<string | null> {
    const walk = this.walk;
    if (!walk) return null;
    const direction = walk.path[walk.index];
    if (direction === undefined) {
      this.walk = null;
      await this.record("autowalk.completed", { target_id: walk.targetId });
      return null;
    }
    walk.index++;
    this.armPending({ kind: "move", direction });
    this.legend = new Map();
    await this.record("autowalk.step", { direction, remaining: walk.path.length - walk.index });
    return direction;
  }

  async cancelAutoWalk(): Promise<boolean> {
    const walk = this.walk;
    if (!walk) return false;
    this.walk = null;
    await this.record("autowalk.aborted", { target_id: walk.targetId, reason: "cancelled" });
    return true;
  }

  // ─── Client commands ─────────────────────────────────────────

  async handleClientCommand(input: string): Promise<void> {
    const parts = input.slice(1).split(/\s+/).filter(Boolean);
    const [name, ...args] = parts;
    if (name === undefined) {
      this.writer.write(errorLine("Error: Empty command"));
      return;
    }

    switch (name.toLowerCase()) {
      case "map":
        this.writeLines(mapInfoLines(this.map));
        return;
      case "rooms":
        this.listRooms(args);
        return;
      case "point":
        this.point(args);
        return;
      case "wayfind":
        this.wayfind(args);
        return;
      case "go":
        await this.go(args);
        return;
      case "nearby":
        this.nearby();
        return;
      case "legend":
        this.showLegend();
        return;
      case "help":
        this.writeLines(helpLines());
        return;
      default:
        this.writer.write(errorLine(`Error: Unknown command '/${name}'. Type /help for available commands.`));
    }
  }

  private listRooms(args: string[]): void {
    const query = args.join(" ");
    const rooms = query ? this.map.findRooms(query) : this.map.numberedRooms();
    if (rooms.length === 0) {
      this.writer.write(noticeLine(query ? `No rooms found matching '${query}'` : "No rooms have been explored yet."));
      return;
    }
    this.lastSearch = rooms;
    this.writer.write(successLine(query ? `=== Rooms matching '${query}' (${rooms.length}) ===` : `=== Known Rooms (${rooms.length}) ===`));
    for (const room of rooms) {
      this.writer.write(roomLine(this.map.getRoomNumber(room.id) ?? 0, room));
    }
  }

  private point(args: string[]): void {
    const target = this.selectRoom(args, "point");
    if (!target) return;
    const path = findPath(this.map, target.id);
    if (path === null) {
      this.writer.write(errorLine(`No path found to '${target.title}'`));
    } else if (path.length === 0) {
      this.writer.write(successLine("You are already at that location!"));
    } else {
      this.writer.write(successLine(`To reach '${target.title}', go: ${path[0] ?? ""}`));
    }
  }

  private wayfind(args: string[]): void {
    const target = this.selectRoom(args, "wayfind");
    if (!target) return;
    const steps = findPathWithRooms(this.map, target.id);
    if (steps === null) {
      this.writer.write(errorLine(`No path found to '${target.title}'`));
    } else if (steps.length === 0) {
      this.writer.write(successLine("You are already at that location!"));
    } else {
      this.writeLines(pathLines(target.title, steps));
    }
  }

  private async go(args: string[]): Promise<void> {
    if (args.length === 0 && this.walk) {
      await this.cancelAutoWalk();
      this.writer.write(noticeLine("Auto-walk cancelled."));
      return;
    }
    const target = this.selectRoom(args, "go");
    if (!target) return;
    const path = await this.startAutoWalk(target.id);
    if (path === null) {
      this.writer.write(errorLine(`No path found to '${target.title}'`));
    } else if (path.length === 0) {
      this.writer.write(successLine("You are already at that location!"));
    } else {
      this.writer.write(successLine(`Auto-walking to '${target.title}' (${path.length} steps). Type /go to cancel.`));
    }
  }

  /**
   * Narrows `candidates` to the rooms a numbered map still draws. Numbers of
   * two or more digits widen every cell, so each pass renumbers what is left
   * and drops what fell out of view, until nothing more drops.
   */
  private numberOnMap<T>(
    candidates: readonly T[],
    roomOf: (item: T) => Room,
    numberOf: (item: T, index: number) => number,
  ): { shown: T[]; legend: Map<string, number> } {
    const { width, height } = this.viewport;
    const unnumbered = new Set(visibleRoomIds(this.map, width, height));
    let shown = candidates.filter((item) => unnumbered.has(roomOf(item).id));
    for (;;) {
      const legend = new Map(shown.map((item, i): [string, number] => [roomOf(item).id, numberOf(item, i)]));
      const visible = new Set(visibleRoomIds(this.map, width, height, { legend }));
      const next = shown.filter((item) => visible.has(roomOf(item).id));
      if (next.length === shown.length) return { shown, legend };
      shown = next;
    }
  }

  private nearby(): void {
    const nearby = findNearbyRooms(this.map, this.nearbyRadius);
    if (nearby === null) {
      this.writer.write(errorLine("No current room. You need to be in a mapped location."));
      return;
    }
    const { shown, legend } = this.numberOnMap(nearby, (entry) => entry.room, (_entry, i) => i + 1);
    if (shown.length === 0) {
      this.writer.write(noticeLine(`No nearby rooms within ${this.nearbyRadius} steps are visible on the map.`));
      return;
    }

    this.writer.write(successLine(`=== Nearby Rooms (${shown.length} visible on map) ===`));
    this.legend = legend;
    let distance = -1;
    shown.forEach((entry, i) => {
      if (entry.distance !== distance) {
        distance = entry.distance;
        this.writer.write(noticeLine(`${distance} ${distance === 1 ? "step" : "steps"} away:`));
      }
      this.writer.write(roomLine(i + 1, entry.room));
    });
  }

  private showLegend(): void {
    if (this.map.roomCount === 0) {
      this.writer.write(noticeLine("No rooms have been explored yet."));
      return;
    }
    const { shown: rooms, legend } = this.numberOnMap(
      this.map.numberedRooms(),
      (room) => room,
      (room) => this.map.getRoomNumber(room.id) ?? 0,
    );
    if (rooms.length === 0) {
      this.writer.write(noticeLine("No rooms are currently visible on the map."));
      return;
    }

    this.writer.write(successLine(`=== Rooms on Map (${rooms.length} visible) ===`));
    this.legend = legend;
    for (const room of rooms) {
      this.writer.write(roomLine(legend.get(room.id) ?? 0, room));
    }
  }

  // ─── Room selection ──────────────────────────────────────────

  /**
   * Resolves "<query>", "<n>" or "<n> <query>" to one room, writing the
   * reason when it cannot.
   */
  private selectRoom(args: string[], command: string): Room | null {
    const [first, ...rest] = args;
    if (first === undefined) {
      this.writer.write(errorLine(`Usage: /${command} <room search terms> or /${command} <number> [search terms]`));
      return null;
    }

    if (/^\d+$/.test(first)) {
      const n = parseInt(first, 10);
      if (rest.length === 0) return this.selectByNumber(n);

      const query = rest.join(" ");
      const matches = this.map.findRooms(query);
      if (matches.length === 0) {
        this.writer.write(errorLine(`No rooms found matching '${query}'`));
        return null;
      }
      const room = matches[n - 1];
      if (!room) {
        this.writer.write(errorLine(`Invalid room number. Found ${matches.length} rooms matching '${query}'. Must be between 1 and ${matches.length}.`));
        return null;
      }
      this.lastSearch = matches;
      return room;
    }

    const query = args.join(" ");
    const matches = this.map.findRooms(query);
    const [only] = matches;
    if (only === undefined) {
      this.writer.write(errorLine(`No rooms found matching '${query}'`));
      return null;
    }
    if (matches.length > 1) {
      this.lastSearch = matches;
      this.writeLines(matchList(query, matches, command));
      return null;
    }
    return only;
  }

  private selectByNumber(n: number): Room | null {
    for (const [id, number] of this.legend) {
      if (number !== n) continue;
      const room = this.map.getRoom(id);
      if (room) return room;
    }
    const numbered = this.map.getRoomByNumber(n);
    if (numbered) return numbered;
    if (this.lastSearch.length > 0) {
      const room = this.lastSearch[n - 1];
      if (room) return room;
      this.writer.write(errorLine(`Invalid room number. Must be between 1 and ${this.lastSearch.length}.`));
      return null;
    }
    this.writer.write(errorLine(`No room numbered ${n}. Use /rooms, /nearby, or /legend to see room listings.`));
    return null;
  }

  // ─── Helpers ─────────────────────────────────────────────────

  private writeLines(lines: readonly string[]): void {
    for (const line of lines) this.writer.write(line);
  }

  private async record(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    if (!this.journal) return;
    await this.journal.tryEmit(this.sessionId, type, payload);
  }
}
