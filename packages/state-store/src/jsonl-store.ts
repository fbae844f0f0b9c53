/**
 * @tradeledger/state-store — File-based JSONL StateStore implementation.
 *
 * Persists every write as one JSON object per line in a `.jsonl` file.
 * The current state is the replay of all lines in order.
 *
 * Crash safety:
 * - Each write flushes to disk via fsync before returning
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; the in-memory map is derived
 *
 * File format:
 * {"op":"put","key":"A001","value":"<base64>","at":"2024-01-15T10:00:00.000Z"}
 * {"op":"delete","key":"A001","at":"2024-01-15T11:00:00.000Z"}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { StateStore } from "./types.js";
import { StateStoreError, assertValidKey } from "./types.js";

/**
 * Options for creating a JsonlStateStore.
 */
export interface JsonlStateStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

type JsonlRecord =
  | { readonly op: "put"; readonly key: string; readonly value: string; readonly at: string }
  | { readonly op: "delete"; readonly key: string; readonly at: string };

function isJsonlRecord(value: unknown): value is JsonlRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (typeof v.key !== "string" || v.key.length === 0 || typeof v.at !== "string") {
    return false;
  }
  if (v.op === "put") return typeof v.value === "string";
  return v.op === "delete";
}

/**
 * File-based JSONL state store.
 *
 * The in-memory map is rebuilt from the file on construction.
 */
export class JsonlStateStore implements StateStore {
  private readonly _filePath: string;
  private readonly _data = new Map<string, Uint8Array>();
  private _skippedLines = 0;

  /**
   * Create a new JsonlStateStore.
   *
   * If the file exists, state is replayed from it.
   * If the file does not exist, it will be created on first write.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlStateStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get(key: string): Uint8Array | undefined {
    assertValidKey(key);
    const value = this._data.get(key);
    return value !== undefined ? Uint8Array.from(value) : undefined;
  }

  put(key: string, value: Uint8Array): void {
    assertValidKey(key);
    const record: JsonlRecord = {
      op: "put",
      key,
      value: Buffer.from(value).toString("base64"),
      at: new Date().toISOString(),
    };
    this._writeAndSync(key, JSON.stringify(record) + "\n");
    // Update in-memory state only after successful write
    this._data.set(key, Uint8Array.from(value));
  }

  delete(key: string): void {
    assertValidKey(key);
    if (!this._data.has(key)) {
      return;
    }
    const record: JsonlRecord = { op: "delete", key, at: new Date().toISOString() };
    this._writeAndSync(key, JSON.stringify(record) + "\n");
    this._data.delete(key);
  }

  readonly keys = (): readonly string[] => [...this._data.keys()];

  /**
   * Get the file path this store writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  /**
   * Number of unreadable lines skipped during the last load.
   */
  get skippedLines(): number {
    return this._skippedLines;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Replay the JSONL file into memory.
   *
   * Tolerates partial/corrupt lines (which can happen on unclean shutdown).
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        this._skippedLines++;
        continue;
      }

      if (!isJsonlRecord(parsed)) {
        this._skippedLines++;
        continue;
      }

      if (parsed.op === "put") {
        this._data.set(parsed.key, new Uint8Array(Buffer.from(parsed.value, "base64")));
      } else {
        this._data.delete(parsed.key);
      }
    }
  }

  private _writeAndSync(key: string, data: string): void {
    let fd: number;
    try {
      fd = openSync(this._filePath, "a");
    } catch (err) {
      throw new StateStoreError("WRITE_FAILED", `Cannot open "${this._filePath}" for key "${key}"`, {
        key,
        cause: err,
      });
    }
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      throw new StateStoreError("WRITE_FAILED", `Failed to persist key "${key}"`, { key, cause: err });
    } finally {
      closeSync(fd);
    }
  }
}
