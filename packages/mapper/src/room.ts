import type { ExitTarget } from "@waymark/schemas";
import { extractFirstSentence } from "./room-identity.js";

export interface RoomInit {
  id: string;
  title: string;
  description: string;
  firstSentence?: string;
  exits?: Iterable<[string, ExitTarget]>;
  visitCount?: number;
}

const UNEXPLORED: ExitTarget = { kind: "unexplored" };

export class Room {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly firstSentence: string;
  readonly exits: Map<string, ExitTarget>;
  visitCount: number;

  constructor(init: RoomInit) {
    this.id = init.id;
    this.title = init.title;
    this.description = init.description;
    this.firstSentence = init.firstSentence ?? extractFirstSentence(init.description);
    this.exits = new Map(init.exits ?? []);
    this.visitCount = init.visitCount ?? 1;
  }

  /** A freshly observed room: every listed exit starts unexplored. */
  static observed(id: string, title: string, description: string, exits: readonly string[]): Room {
    return new Room({ id, title, description, exits: exits.map((dir) => [dir, UNEXPLORED]) });
  }

  knownDestination(direction: string): string | null {
    const exit = this.exits.get(direction);
    return exit?.kind === "known" ? exit.roomId : null;
  }

  /** Records the exit as unexplored unless something is already recorded. */
  addExit(direction: string): void {
    if (!this.exits.has(direction)) this.exits.set(direction, UNEXPLORED);
  }

  linkExit(direction: string, roomId: string): void {
    this.exits.set(direction, { kind: "known", roomId });
  }

  removeExit(direction: string): boolean {
    return this.exits.delete(direction);
  }

  searchText(): string {
    const dirs = [...this.exits.keys()].sort();
    return `${this.title} ${this.firstSentence} ${dirs.join(" ")}`.toLowerCase();
  }

  matchesSearch(terms: readonly string[]): boolean {
    const text = this.searchText();
    return terms.every((term) => text.includes(term.toLowerCase()));
  }
}
