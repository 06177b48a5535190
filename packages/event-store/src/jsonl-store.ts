/**
 * @tracebound/event-store: File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append is written with a single write + fsync before the
 *   in-memory index changes
 * - A torn final line (unclean shutdown mid-write) is cut off the file on
 *   load, so the next append starts on a fresh line
 * - Any other unreadable line is corruption and refuses to load
 *
 * File format:
 * Each line is a StoredEvent, hash fields included:
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  truncateSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@tracebound/types";
import type { StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";
import { InMemoryEventStore } from "./in-memory-store.js";
import type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export interface JsonlEventStoreOptions extends InMemoryEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 */
export class JsonlEventStore extends InMemoryEventStore {
  private readonly _filePath: string;

  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;

    mkdirSync(dirname(this._filePath), { recursive: true });
    this.index(this._loadFromFile());
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override persist(events: readonly StoredEvent[]): void {
    const lines = events.map((e) => JSON.stringify(e) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, lines, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private _loadFromFile(): StoredEvent[] {
    if (!existsSync(this._filePath)) {
      return [];
    }

    const content = readFileSync(this._filePath, "utf-8");
    const lines: { text: string; start: number }[] = [];
    let offset = 0;
    for (const raw of content.split("\n")) {
      const text = raw.trim();
      if (text.length > 0) lines.push({ text, start: offset });
      offset += Buffer.byteLength(raw, "utf-8") + 1;
    }

    const events: StoredEvent[] = [];
    for (const [i, { text, start }] of lines.entries()) {
      const isLast = i === lines.length - 1;
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (error: unknown) {
        if (isLast) {
          // Torn write from an unclean shutdown: drop the fragment
          truncateSync(this._filePath, start);
          break;
        }
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Unreadable record on line ${i + 1} of ${this._filePath}: ${String(error)}`,
        );
      }

      if (!isStoredEvent(parsed)) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Malformed record on line ${i + 1} of ${this._filePath}`,
        );
      }
      if (parsed.globalPosition !== events.length + 1) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Expected global position ${events.length + 1} on line ${i + 1}, found ${parsed.globalPosition}`,
        );
      }
      events.push(parsed);
    }

    return events;
  }
}

function isStoredEvent(value: unknown): value is StoredEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDomainEvent(v.event) &&
    typeof v.streamId === "string" &&
    typeof v.version === "number" &&
    typeof v.globalPosition === "number" &&
    typeof v.appendedAt === "string" &&
    typeof v.hash === "string" &&
    typeof v.previousHash === "string"
  );
}
