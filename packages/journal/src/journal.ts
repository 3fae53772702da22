import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@waymark/schemas";
import { WaymarkError, isJournalEvent, validateJournalEventData } from "@waymark/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL log of mapping events. Each line carries the sha256 of
 * the previous line in `hash_prev`, so edits to earlier lines are detectable.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private sessionIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private recovery: "truncate" | "strict";
  private closed = false;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    const last = lines[lines.length - 1];
    if (last !== undefined && parseLine(last) === null) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      console.error(`[journal] truncated incomplete last line`);
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const tempIndex = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
        if (this.recovery === "strict") {
          throw new WaymarkError("JOURNAL_CORRUPTED", `Journal integrity violation at event ${i}: hash chain broken`, { index: i });
        }
        console.error(`[journal] recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
        const tmpPath = `${this.filePath}.tmp`;
        const validLines = lines.slice(0, i);
        await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        break;
      }
      prevHash = this.hash(line);
      const bucket = tempIndex.get(event.session_id);
      if (bucket) bucket.push(event);
      else tempIndex.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.sessionIndex = tempIndex;
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    if (this.closed) {
      throw new WaymarkError("JOURNAL_CLOSED", "Journal is closed");
    }
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: sessionId,
        type,
        payload,
        hash_prev: this.lastHash,
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Commit in-memory state only after the write landed
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.sessionIndex.get(sessionId);
      if (bucket) bucket.push(event);
      else this.sessionIndex.set(sessionId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`[journal] listener failed:`, err instanceof Error ? err.message : String(err));
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit, but logs and returns null instead of throwing. */
  async tryEmit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(sessionId, type, payload);
    } catch (err) {
      console.warn(`[journal] could not record ${type}:`, err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events: JournalEvent[] = [];
    for (const line of content.trim().split("\n").filter(Boolean)) {
      const event = parseLine(line);
      if (event) events.push(event);
    }
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readSession(sessionId: string, options?: { offset?: number; limit?: number }): JournalEvent[] {
    const events = this.sessionIndex.get(sessionId) ?? [];
    if (!options) return [...events];
    const start = options.offset ?? 0;
    const end = options.limit !== undefined ? start + options.limit : undefined;
    return events.slice(start, end);
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(line);
    }
    return { valid: true };
  }

  /** Waits for pending writes; later emits are rejected. Safe to call twice. */
  async close(): Promise<void> {
    this.closed = true;
    await this.writeLock;
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }
}

function parseLine(line: string): JournalEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isJournalEvent(parsed) ? parsed : null;
}
