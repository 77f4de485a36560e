import { mkdirSync, createWriteStream } from "fs";
import { mkdtemp, rm } from "fs/promises";
import { dirname, join } from "path";
import { tmpdir } from "os";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";
import Database from "better-sqlite3";
import { v4 as uuidv4, v7 as uuidv7 } from "uuid";
import { z } from "zod";
import {
  openDatabase,
  getMeta,
  setMeta,
  deleteMeta,
  insertLore,
  upsertRemoteLore,
  tombstoneLore,
  getActiveLore,
  getLoreByIds,
  queryLore,
  updateLoreFields,
  deleteAllLore,
  getUnsyncedLore,
  getUnsyncedDeletions,
  markSynced,
  markVersionSynced,
  setSyncError,
  enqueueFeedback,
  getPendingFeedback,
  deleteFeedback,
  clearFeedbackQueue,
  countActiveLore,
  countPendingSync,
  countPendingFeedback,
  confidenceSummary,
  normalizeSources,
  parseCategory,
  parseEmbeddingStatus,
  parseSources,
  SCHEMA_VERSION,
} from "./db.js";
import { RWLock } from "./lock.js";
import { LocalIOError, LoreSyncError, NotFoundError, toErrorMessage, ValidationError } from "./errors.js";
import { DEFAULT_STORE_ID } from "./store-id.js";
import { logWarn } from "./log.js";
import type { SyncStore } from "./sync.js";
import {
  CATEGORIES,
  CONFIDENCE_DEFAULT,
  CONFIDENCE_HELPFUL_DELTA,
  CONFIDENCE_INCORRECT_DELTA,
  MAX_CONTENT_LENGTH,
  MAX_CONTEXT_LENGTH,
  type DetailedStats,
  type FeedbackOutcome,
  type FeedbackQueueEntry,
  type FeedbackUpdate,
  type Lore,
  type LorePatch,
  type QueryParams,
  type RecordInput,
  type StoreStats,
} from "../types.js";

export const META_EMBEDDING_MODEL = "embedding_model";
export const META_LAST_SYNC = "last_sync";
export const META_DELTA_CURSOR = "delta_cursor";
export const META_SOURCE_ID = "source_id";
export const META_DESCRIPTION = "description";

export type SnapshotSource = Readable | AsyncIterable<Uint8Array>;

export interface DeltaPage {
  changes: Lore[];
  deletedIds: string[];
  nextCursor: string;
}

/** A record as it was when collected for a push. */
export interface RecordVersion {
  id: string;
  updatedAt: string;
}

export interface SyncErrorEntry {
  id: string;
  message: string;
}

export interface LoreStoreOptions {
  storeId?: string;
  /** Injected clock; tests pin timestamps with it. */
  clock?: () => Date;
}

const recordInputSchema = z.object({
  content: z
    .string()
    .refine((s) => s.trim().length > 0, "cannot be empty")
    .refine((s) => s.length <= MAX_CONTENT_LENGTH, `exceeds ${MAX_CONTENT_LENGTH} character limit`),
  category: z.enum(CATEGORIES),
  context: z.string().max(MAX_CONTEXT_LENGTH, `exceeds ${MAX_CONTEXT_LENGTH} character limit`).optional(),
  confidence: z.number().min(0, "must be between 0.0 and 1.0").max(1, "must be between 0.0 and 1.0").optional(),
  source_id: z.string().optional(),
  sources: z.array(z.string()).optional(),
});

/**
 * New confidence after one feedback outcome, clamped to [0, 1].
 * Rounded to 6 places so repeated adjustments do not accumulate float noise.
 */
export function adjustConfidence(confidence: number, outcome: FeedbackOutcome): number {
  let delta = 0;
  if (outcome === "helpful") delta = CONFIDENCE_HELPFUL_DELTA;
  if (outcome === "incorrect") delta = CONFIDENCE_INCORRECT_DELTA;
  const next = Math.round((confidence + delta) * 1e6) / 1e6;
  return Math.min(1, Math.max(0, next));
}

/**
 * One store's embedded database.
 *
 * Reads share the lock; every mutation (record writes, snapshot replace,
 * metadata writes, sync marking) takes it exclusively. The SQLite file is
 * owned by this instance for the life of the process.
 */
export class LoreStore implements SyncStore {
  readonly storeId: string;
  readonly path: string;
  readonly sourceId: string;

  private db: Database.Database;
  private readonly lock = new RWLock();
  private readonly clock: () => Date;
  private closed = false;

  private constructor(db: Database.Database, path: string, storeId: string, clock: () => Date) {
    this.db = db;
    this.path = path;
    this.storeId = storeId;
    this.clock = clock;

    let sourceId = getMeta(db, META_SOURCE_ID);
    if (!sourceId) {
      sourceId = uuidv4();
      setMeta(db, META_SOURCE_ID, sourceId);
    }
    this.sourceId = sourceId;
  }

  static open(path: string, options: LoreStoreOptions = {}): LoreStore {
    try {
      mkdirSync(dirname(path), { recursive: true });
      const db = openDatabase(path);
      return new LoreStore(db, path, options.storeId ?? DEFAULT_STORE_ID, options.clock ?? (() => new Date()));
    } catch (err) {
      throw new LocalIOError("open", err);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    await this.lock.write(() => {
      if (this.closed) return;
      this.closed = true;
      this.db.close();
    });
  }

  // ── Metadata ──────────────────────────────────────────

  getMetadata(key: string): Promise<string> {
    return this.read("get_metadata", () => getMeta(this.db, key) ?? "");
  }

  setMetadata(key: string, value: string): Promise<void> {
    return this.write("set_metadata", () => setMeta(this.db, key, value));
  }

  describe(): Promise<string> {
    return this.getMetadata(META_DESCRIPTION);
  }

  setDescription(description: string): Promise<void> {
    return this.setMetadata(META_DESCRIPTION, description);
  }

  // ── Records ───────────────────────────────────────────

  async record(input: RecordInput): Promise<Lore> {
    const parsed = recordInputSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(String(issue.path[0] ?? "input"), issue.message);
    }

    return this.write("record", () => {
      const now = this.now();
      const lore: Lore = {
        id: uuidv7(),
        content: parsed.data.content,
        context: parsed.data.context || null,
        category: parsed.data.category,
        confidence: parsed.data.confidence ?? CONFIDENCE_DEFAULT,
        embedding: null,
        embedding_status: "pending",
        source_id: parsed.data.source_id || null,
        sources: normalizeSources(parsed.data.sources ?? []),
        validation_count: 0,
        last_validated_at: null,
        created_at: now,
        updated_at: now,
        synced_at: null,
        deleted_at: null,
        sync_error: null,
      };
      insertLore(this.db, lore);
      return lore;
    });
  }

  get(id: string): Promise<Lore | null> {
    return this.read("get", () => getActiveLore(this.db, id));
  }

  getMany(ids: string[]): Promise<Lore[]> {
    return this.read("get_many", () => getLoreByIds(this.db, ids));
  }

  query(params: QueryParams = {}): Promise<Lore[]> {
    return this.read("query", () => queryLore(this.db, params));
  }

  /** Local edit. Any change to content, context, confidence or category marks the record dirty. */
  async update(id: string, patch: LorePatch): Promise<Lore> {
    if (patch.confidence !== undefined && (patch.confidence < 0 || patch.confidence > 1)) {
      throw new ValidationError("confidence", "must be between 0.0 and 1.0");
    }
    if (patch.content !== undefined && (!patch.content.trim() || patch.content.length > MAX_CONTENT_LENGTH)) {
      throw new ValidationError("content", `must be 1-${MAX_CONTENT_LENGTH} characters`);
    }
    if (patch.context && patch.context.length > MAX_CONTEXT_LENGTH) {
      throw new ValidationError("context", `exceeds ${MAX_CONTEXT_LENGTH} character limit`);
    }

    return this.write("update", () => {
      const lore = getActiveLore(this.db, id);
      if (!lore) throw new NotFoundError("lore", id);

      const next: Lore = {
        ...lore,
        content: patch.content ?? lore.content,
        context: patch.context === undefined ? lore.context : patch.context || null,
        category: patch.category ?? lore.category,
        confidence: patch.confidence ?? lore.confidence,
      };
      const changed =
        next.content !== lore.content ||
        next.context !== lore.context ||
        next.category !== lore.category ||
        next.confidence !== lore.confidence;
      if (!changed) return lore;

      next.updated_at = this.now();
      next.synced_at = null;
      next.sync_error = null;
      updateLoreFields(this.db, next);
      return next;
    });
  }

  /** Tombstone the record; the deletion is pushed on the next sync. */
  async softDelete(id: string): Promise<void> {
    await this.write("soft_delete", () => {
      if (tombstoneLore(this.db, id, this.now(), null) === 0) {
        throw new NotFoundError("lore", id);
      }
    });
  }

  async applyFeedback(id: string, outcome: FeedbackOutcome): Promise<FeedbackUpdate> {
    return this.write("apply_feedback", () => {
      const lore = getActiveLore(this.db, id);
      if (!lore) throw new NotFoundError("lore", id);

      const now = this.now();
      const current = adjustConfidence(lore.confidence, outcome);
      const changed = current !== lore.confidence;
      const next: Lore = {
        ...lore,
        confidence: current,
        validation_count: lore.validation_count + 1,
        last_validated_at: now,
        updated_at: now,
        synced_at: changed ? null : lore.synced_at,
        sync_error: changed ? null : lore.sync_error,
      };

      this.db.transaction(() => {
        updateLoreFields(this.db, next);
        enqueueFeedback(this.db, id, outcome, now);
      })();

      return {
        id,
        previous: lore.confidence,
        current,
        validation_count: next.validation_count,
      };
    });
  }

  // ── Sync surface ──────────────────────────────────────

  /**
   * Replace every record with the contents of a snapshot database file.
   *
   * The stream is spooled to a temp file and fully read before the write
   * lock is taken; the swap itself is one transaction. Until that commits,
   * the existing records, feedback queue and delta cursor stay as they were.
   */
  async replaceFromSnapshot(source: SnapshotSource, options: { signal?: AbortSignal } = {}): Promise<number> {
    const { signal } = options;
    const dir = await mkdtemp(join(tmpdir(), "loresync-snapshot-"));
    const file = join(dir, "snapshot.db");

    try {
      try {
        await pipeline(source, createWriteStream(file), { signal });
      } catch (err) {
        if (signal?.aborted) throw err;
        throw new LocalIOError("replace_from_snapshot: spool", err);
      }

      let entries: Lore[];
      try {
        const snapshot = readSnapshot(file, this.now());
        entries = snapshot.entries;
        for (const s of snapshot.skipped) {
          logWarn(`${this.storeId}: skipped snapshot record ${s.id}: ${s.message}`);
        }
      } catch (err) {
        throw new LocalIOError("replace_from_snapshot: read", err);
      }

      return await this.write("replace_from_snapshot", () => {
        signal?.throwIfAborted();
        this.db.transaction(() => {
          deleteAllLore(this.db);
          clearFeedbackQueue(this.db);
          deleteMeta(this.db, META_DELTA_CURSOR);
          for (const lore of entries) {
            insertLore(this.db, lore);
          }
        })();
        return entries.length;
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  /** Dirty, visible records in creation order (ties by id). */
  unsynced(): Promise<Lore[]> {
    return this.read("unsynced", () => getUnsyncedLore(this.db));
  }

  unsyncedDeletions(): Promise<string[]> {
    return this.read("unsynced_deletions", () => getUnsyncedDeletions(this.db));
  }

  markSynced(ids: string[], syncedAt: string): Promise<void> {
    return this.write("mark_synced", () => {
      if (ids.length === 0) return;
      this.db.transaction(() => markSynced(this.db, ids, syncedAt))();
    });
  }

  /** Like markSynced, but skips records edited since `updatedAt`. */
  markVersionsSynced(versions: RecordVersion[], syncedAt: string): Promise<void> {
    return this.write("mark_synced", () => {
      if (versions.length === 0) return;
      this.db.transaction(() => {
        for (const v of versions) markVersionSynced(this.db, v.id, v.updatedAt, syncedAt);
      })();
    });
  }

  recordSyncErrors(errors: SyncErrorEntry[]): Promise<void> {
    return this.write("record_sync_errors", () => {
      if (errors.length === 0) return;
      this.db.transaction(() => {
        for (const e of errors) setSyncError(this.db, e.id, e.message);
      })();
    });
  }

  pendingFeedback(): Promise<FeedbackQueueEntry[]> {
    return this.read("pending_feedback", () => getPendingFeedback(this.db));
  }

  markFeedbackSynced(ids: number[]): Promise<void> {
    return this.write("mark_feedback_synced", () => {
      if (ids.length === 0) return;
      this.db.transaction(() => deleteFeedback(this.db, ids))();
    });
  }

  /**
   * Apply one delta page: upserts, then tombstones, then the cursor, all in
   * one transaction. A crash before commit replays the page on the next pull.
   */
  applyDeltaPage(page: DeltaPage): Promise<{ upserted: number; deleted: number }> {
    return this.write("apply_delta", () => {
      const now = this.now();
      let deleted = 0;
      this.db.transaction(() => {
        for (const lore of page.changes) {
          upsertRemoteLore(this.db, { ...lore, synced_at: now, sync_error: null });
        }
        for (const id of page.deletedIds) {
          deleted += tombstoneLore(this.db, id, now, now);
        }
        setMeta(this.db, META_DELTA_CURSOR, page.nextCursor);
      })();
      return { upserted: page.changes.length, deleted };
    });
  }

  // ── Stats ─────────────────────────────────────────────

  stats(): Promise<StoreStats> {
    return this.read("stats", () => ({
      lore_count: countActiveLore(this.db),
      pending_sync: countPendingSync(this.db),
      pending_feedback: countPendingFeedback(this.db),
      last_sync: getMeta(this.db, META_LAST_SYNC) ?? "",
      schema_version: getMeta(this.db, "schema_version") ?? SCHEMA_VERSION,
    }));
  }

  detailedStats(): Promise<DetailedStats> {
    return this.read("detailed_stats", () => {
      const summary = confidenceSummary(this.db);
      const distribution: DetailedStats["category_distribution"] = {};
      for (const { category, n } of summary.categories) {
        distribution[parseCategory(category, "(aggregate)")] = n;
      }
      return {
        lore_count: countActiveLore(this.db),
        average_confidence: summary.average,
        category_distribution: distribution,
        last_updated: summary.lastUpdated,
      };
    });
  }

  // ── Internals ─────────────────────────────────────────

  private now(): string {
    return this.clock().toISOString();
  }

  private read<T>(operation: string, fn: () => T): Promise<T> {
    return this.lock.read(() => this.guard(operation, fn));
  }

  private write<T>(operation: string, fn: () => T): Promise<T> {
    return this.lock.write(() => this.guard(operation, fn));
  }

  private guard<T>(operation: string, fn: () => T): T {
    if (this.closed) {
      throw new LocalIOError(operation, new Error("store is closed"));
    }
    try {
      return fn();
    } catch (err) {
      if (err instanceof LoreSyncError) throw err;
      if (err instanceof Error && err.name === "AbortError") throw err;
      throw new LocalIOError(operation, err);
    }
  }
}

// ── Snapshot decoding ───────────────────────────────────

function readSnapshot(file: string, syncedAt: string): { entries: Lore[]; skipped: SyncErrorEntry[] } {
  // Opened as-is: the schema is the remote's, so nothing is created or migrated.
  const snapshot = new Database(file, { fileMustExist: true });
  try {
    const table = snapshot
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'lore_entries'")
      .get();
    if (!table) {
      throw new Error("snapshot has no lore_entries table");
    }
    const rows = snapshot.prepare<[], Record<string, unknown>>("SELECT * FROM lore_entries").all();
    const entries: Lore[] = [];
    const skipped: SyncErrorEntry[] = [];
    for (const row of rows) {
      if (row.deleted_at !== null && row.deleted_at !== undefined) continue;
      try {
        entries.push(snapshotRowToLore(row, syncedAt));
      } catch (err) {
        skipped.push({ id: optionalText(row, "id") ?? "(unknown)", message: toErrorMessage(err) });
      }
    }
    return { entries, skipped };
  } finally {
    snapshot.close();
  }
}

function snapshotRowToLore(row: Record<string, unknown>, syncedAt: string): Lore {
  const id = requireText(row, "id");
  const embedding = row.embedding instanceof Uint8Array ? new Uint8Array(row.embedding) : null;
  return {
    id,
    content: requireText(row, "content"),
    context: optionalText(row, "context"),
    category: parseCategory(requireText(row, "category"), id),
    confidence: Math.min(1, Math.max(0, numberOr(row, "confidence", CONFIDENCE_DEFAULT))),
    embedding,
    embedding_status: parseEmbeddingStatus(optionalText(row, "embedding_status")),
    source_id: optionalText(row, "source_id"),
    sources: parseSources(optionalText(row, "sources")),
    validation_count: numberOr(row, "validation_count", 0),
    last_validated_at: optionalText(row, "last_validated_at"),
    created_at: requireText(row, "created_at"),
    updated_at: optionalText(row, "updated_at") ?? requireText(row, "created_at"),
    synced_at: syncedAt,
    deleted_at: null,
    sync_error: null,
  };
}

function optionalText(row: Record<string, unknown>, key: string): string | null {
  const value = row[key];
  return typeof value === "string" && value !== "" ? value : null;
}

function requireText(row: Record<string, unknown>, key: string): string {
  const value = optionalText(row, key);
  if (value === null) {
    throw new Error(`snapshot row is missing "${key}"`);
  }
  return value;
}

function numberOr(row: Record<string, unknown>, key: string, fallback: number): number {
  const value = row[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}
