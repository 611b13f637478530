// Key-value persistence behind a small interface, so the score cache can run
// against memory in tests and a JSON file on disk otherwise.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { debugLog } from "../utils/debug";

export type KeyValueStore = {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
};

export class MemoryStore implements KeyValueStore {
  private readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }
}

function isStringRecord(u: unknown): u is Record<string, string> {
  if (typeof u !== "object" || u === null || Array.isArray(u)) return false;
  return Object.values(u).every((v) => typeof v === "string");
}

/**
 * All keys in one JSON object file. The file is read on every access and
 * rewritten on every change; a missing or unreadable file reads as empty,
 * and the next write replaces it.
 */
export class FileStore implements KeyValueStore {
  constructor(private readonly path: string) {}

  private readAll(): Record<string, string> {
    if (!existsSync(this.path)) return {};
    const text = readFileSync(this.path, "utf8");
    if (text.trim() === "") return {};
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      debugLog("storage", `ignoring unreadable ${this.path}`, e);
      return {};
    }
    return isStringRecord(parsed) ? parsed : {};
  }

  private writeAll(items: Record<string, string>): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(items, null, 2), "utf8");
  }

  getItem(key: string): string | null {
    return this.readAll()[key] ?? null;
  }

  setItem(key: string, value: string): void {
    this.writeAll({ ...this.readAll(), [key]: value });
  }

  removeItem(key: string): void {
    const items = this.readAll();
    if (!(key in items)) return;
    const { [key]: _removed, ...rest } = items;
    this.writeAll(rest);
  }
}
