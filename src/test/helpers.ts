import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { insertLore, openDatabase } from "../core/db.js";
import type { Lore } from "../types.js";

export function makeLore(overrides: Partial<Lore> = {}): Lore {
  return {
    id: "lore-1",
    content: "Prepared statements are cached per connection",
    context: null,
    category: "DEPENDENCY_BEHAVIOR",
    confidence: 0.5,
    embedding: null,
    embedding_status: "pending",
    source_id: null,
    sources: [],
    validation_count: 0,
    last_validated_at: null,
    created_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
    synced_at: null,
    deleted_at: null,
    sync_error: null,
    ...overrides,
  };
}

/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = "2026-03-01T00:00:00.000Z"): () => Date {
  let t = Date.parse(start);
  return () => {
    t += 1000;
    return new Date(t);
  };
}

export function tempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), "loresync-test-"));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

/** Write a snapshot database file holding `records`. */
export function writeSnapshot(path: string, records: Lore[]): void {
  const db = openDatabase(path);
  for (const lore of records) {
    insertLore(db, lore);
  }
  db.close();
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
