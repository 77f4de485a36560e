import Database from "better-sqlite3";
import {
  isCategory,
  isFeedbackOutcome,
  EMBEDDING_STATUSES,
  type Category,
  type EmbeddingStatus,
  type FeedbackOutcome,
  type FeedbackQueueEntry,
  type Lore,
  type QueryParams,
} from "../types.js";

export const SCHEMA_VERSION = "2";

export interface LoreRow {
  id: string;
  content: string;
  context: string | null;
  category: string;
  confidence: number;
  embedding: Buffer | null;
  embedding_status: string;
  source_id: string | null;
  sources: string;
  validation_count: number;
  last_validated_at: string | null;
  created_at: string;
  updated_at: string;
  synced_at: string | null;
  deleted_at: string | null;
  sync_error: string | null;
}

interface FeedbackRow {
  id: number;
  lore_id: string;
  outcome: string;
  queued_at: string;
}

export function openDatabase(dbPath: string, options: Database.Options = {}): Database.Database {
  const db = new Database(dbPath, options);
  if (!options.readonly) {
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    initSchema(db);
  }
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS lore_entries (
      id TEXT PRIMARY KEY,
      content TEXT NOT NULL,
      context TEXT,
      category TEXT NOT NULL,
      confidence REAL NOT NULL DEFAULT 0.5,
      embedding BLOB,
      embedding_status TEXT NOT NULL DEFAULT 'pending',
      source_id TEXT,
      sources TEXT NOT NULL DEFAULT '[]',
      validation_count INTEGER NOT NULL DEFAULT 0,
      last_validated_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      synced_at TEXT,
      deleted_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_lore_entries_category ON lore_entries(category);
    CREATE INDEX IF NOT EXISTS idx_lore_entries_created_at ON lore_entries(created_at);
    CREATE INDEX IF NOT EXISTS idx_lore_entries_synced_at ON lore_entries(synced_at);
    CREATE INDEX IF NOT EXISTS idx_lore_entries_deleted_at ON lore_entries(deleted_at);

    CREATE TABLE IF NOT EXISTS metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS feedback_queue (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      lore_id TEXT NOT NULL,
      outcome TEXT NOT NULL CHECK (outcome IN ('helpful', 'not_relevant', 'incorrect')),
      queued_at TEXT NOT NULL
    );
  `);

  // Migration: sync_error arrived with per-record push outcomes
  const cols = db.pragma("table_info(lore_entries)") as { name: string }[];
  if (!cols.some((c) => c.name === "sync_error")) {
    db.exec("ALTER TABLE lore_entries ADD COLUMN sync_error TEXT");
  }

  setMeta(db, "schema_version", SCHEMA_VERSION);
  db.prepare("INSERT OR IGNORE INTO metadata (key, value) VALUES ('created_at', ?)").run(
    new Date().toISOString()
  );
  db.prepare("INSERT OR IGNORE INTO metadata (key, value) VALUES ('description', '')").run();
}

// -- Metadata --

export function getMeta(db: Database.Database, key: string): string | null {
  const row = db
    .prepare<[string], { value: string }>("SELECT value FROM metadata WHERE key = ?")
    .get(key);
  return row?.value ?? null;
}

export function setMeta(db: Database.Database, key: string, value: string): void {
  db.prepare(
    "INSERT INTO metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
  ).run(key, value);
}

export function deleteMeta(db: Database.Database, key: string): void {
  db.prepare("DELETE FROM metadata WHERE key = ?").run(key);
}

// -- Lore --

const LORE_COLUMNS = `id, content, context, category, confidence, embedding, embedding_status,
  source_id, sources, validation_count, last_validated_at, created_at, updated_at,
  synced_at, deleted_at, sync_error`;

export function insertLore(db: Database.Database, lore: Lore): void {
  db.prepare(
    `INSERT INTO lore_entries (${LORE_COLUMNS})
     VALUES (@id, @content, @context, @category, @confidence, @embedding, @embedding_status,
             @source_id, @sources, @validation_count, @last_validated_at, @created_at, @updated_at,
             @synced_at, @deleted_at, @sync_error)`
  ).run(loreToParams(lore));
}

/**
 * Apply a record received from the remote. The remote copy wins on every
 * field, but an existing local tombstone is never lifted, and one still
 * waiting to be pushed stays unsynced.
 */
export function upsertRemoteLore(db: Database.Database, lore: Lore): void {
  db.prepare(
    `INSERT INTO lore_entries (${LORE_COLUMNS})
     VALUES (@id, @content, @context, @category, @confidence, @embedding, @embedding_status,
             @source_id, @sources, @validation_count, @last_validated_at, @created_at, @updated_at,
             @synced_at, @deleted_at, NULL)
     ON CONFLICT(id) DO UPDATE SET
       content = excluded.content,
       context = excluded.context,
       category = excluded.category,
       confidence = excluded.confidence,
       embedding = COALESCE(excluded.embedding, lore_entries.embedding),
       embedding_status = excluded.embedding_status,
       source_id = excluded.source_id,
       sources = excluded.sources,
       validation_count = excluded.validation_count,
       last_validated_at = excluded.last_validated_at,
       updated_at = excluded.updated_at,
       synced_at = CASE
         WHEN lore_entries.deleted_at IS NOT NULL AND lore_entries.synced_at IS NULL THEN NULL
         ELSE excluded.synced_at
       END,
       deleted_at = COALESCE(lore_entries.deleted_at, excluded.deleted_at),
       sync_error = NULL`
  ).run(loreToParams(lore));
}

export function tombstoneLore(db: Database.Database, id: string, deletedAt: string, syncedAt: string | null): number {
  return db
    .prepare(
      "UPDATE lore_entries SET deleted_at = ?, updated_at = ?, synced_at = ? WHERE id = ? AND deleted_at IS NULL"
    )
    .run(deletedAt, deletedAt, syncedAt, id).changes;
}

export function getLore(db: Database.Database, id: string): Lore | null {
  const row = db
    .prepare<[string], LoreRow>(`SELECT ${LORE_COLUMNS} FROM lore_entries WHERE id = ?`)
    .get(id);
  return row ? rowToLore(row) : null;
}

export function getActiveLore(db: Database.Database, id: string): Lore | null {
  const lore = getLore(db, id);
  return lore && lore.deleted_at === null ? lore : null;
}

export function getLoreByIds(db: Database.Database, ids: string[]): Lore[] {
  if (ids.length === 0) return [];
  const placeholders = ids.map(() => "?").join(",");
  const rows = db
    .prepare<string[], LoreRow>(
      `SELECT ${LORE_COLUMNS} FROM lore_entries WHERE id IN (${placeholders}) AND deleted_at IS NULL
       ORDER BY created_at ASC, id ASC`
    )
    .all(...ids);
  return rows.map(rowToLore);
}

export function queryLore(db: Database.Database, params: QueryParams): Lore[] {
  const where = ["deleted_at IS NULL"];
  const args: Array<string | number> = [];

  if (params.minConfidence !== undefined) {
    where.push("confidence >= ?");
    args.push(params.minConfidence);
  }
  if (params.categories && params.categories.length > 0) {
    where.push(`category IN (${params.categories.map(() => "?").join(",")})`);
    args.push(...params.categories);
  }
  const text = params.text?.trim().toLowerCase();
  if (text) {
    where.push("(instr(lower(content), ?) > 0 OR instr(lower(COALESCE(context, '')), ?) > 0)");
    args.push(text, text);
  }
  args.push(params.k ?? 5);

  const rows = db
    .prepare<Array<string | number>, LoreRow>(
      `SELECT ${LORE_COLUMNS} FROM lore_entries
       WHERE ${where.join(" AND ")}
       ORDER BY confidence DESC, created_at DESC, id DESC
       LIMIT ?`
    )
    .all(...args);
  return rows.map(rowToLore);
}

export function updateLoreFields(db: Database.Database, lore: Lore): void {
  db.prepare(
    `UPDATE lore_entries SET
       content = @content,
       context = @context,
       category = @category,
       confidence = @confidence,
       validation_count = @validation_count,
       last_validated_at = @last_validated_at,
       updated_at = @updated_at,
       synced_at = @synced_at,
       sync_error = @sync_error
     WHERE id = @id`
  ).run(loreToParams(lore));
}

export function deleteAllLore(db: Database.Database): void {
  db.prepare("DELETE FROM lore_entries").run();
}

// -- Sync journal --

export function getUnsyncedLore(db: Database.Database): Lore[] {
  const rows = db
    .prepare<[], LoreRow>(
      `SELECT ${LORE_COLUMNS} FROM lore_entries
       WHERE synced_at IS NULL AND deleted_at IS NULL
       ORDER BY created_at ASC, id ASC`
    )
    .all();
  return rows.map(rowToLore);
}

export function getUnsyncedDeletions(db: Database.Database): string[] {
  return db
    .prepare<[], { id: string }>(
      `SELECT id FROM lore_entries
       WHERE synced_at IS NULL AND deleted_at IS NOT NULL
       ORDER BY created_at ASC, id ASC`
    )
    .all()
    .map((r) => r.id);
}

export function markSynced(db: Database.Database, ids: string[], syncedAt: string): void {
  const stmt = db.prepare("UPDATE lore_entries SET synced_at = ?, sync_error = NULL WHERE id = ?");
  for (const id of ids) {
    stmt.run(syncedAt, id);
  }
}

/**
 * Mark a record synced only while it still holds the pushed version. An edit
 * made during the push changes updated_at and keeps the record dirty.
 */
export function markVersionSynced(db: Database.Database, id: string, updatedAt: string, syncedAt: string): number {
  return db
    .prepare(
      "UPDATE lore_entries SET synced_at = ?, sync_error = NULL WHERE id = ? AND updated_at = ? AND synced_at IS NULL"
    )
    .run(syncedAt, id, updatedAt).changes;
}

export function setSyncError(db: Database.Database, id: string, message: string): void {
  db.prepare("UPDATE lore_entries SET sync_error = ? WHERE id = ? AND synced_at IS NULL").run(message, id);
}

export function enqueueFeedback(
  db: Database.Database,
  loreId: string,
  outcome: FeedbackOutcome,
  queuedAt: string
): void {
  db.prepare("INSERT INTO feedback_queue (lore_id, outcome, queued_at) VALUES (?, ?, ?)").run(
    loreId,
    outcome,
    queuedAt
  );
}

export function getPendingFeedback(db: Database.Database): FeedbackQueueEntry[] {
  const rows = db
    .prepare<[], FeedbackRow>("SELECT id, lore_id, outcome, queued_at FROM feedback_queue ORDER BY id ASC")
    .all();
  return rows.map((row) => {
    if (!isFeedbackOutcome(row.outcome)) {
      throw new Error(`feedback_queue row ${row.id} has unknown outcome "${row.outcome}"`);
    }
    return { id: row.id, lore_id: row.lore_id, outcome: row.outcome, queued_at: row.queued_at };
  });
}

export function deleteFeedback(db: Database.Database, ids: number[]): void {
  const stmt = db.prepare("DELETE FROM feedback_queue WHERE id = ?");
  for (const id of ids) {
    stmt.run(id);
  }
}

export function clearFeedbackQueue(db: Database.Database): void {
  db.prepare("DELETE FROM feedback_queue").run();
}

// -- Stats --

export function countActiveLore(db: Database.Database): number {
  const row = db
    .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM lore_entries WHERE deleted_at IS NULL")
    .get();
  return row?.n ?? 0;
}

export function countPendingSync(db: Database.Database): number {
  const row = db
    .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM lore_entries WHERE synced_at IS NULL")
    .get();
  return row?.n ?? 0;
}

export function countPendingFeedback(db: Database.Database): number {
  const row = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM feedback_queue").get();
  return row?.n ?? 0;
}

export function confidenceSummary(db: Database.Database): {
  average: number;
  lastUpdated: string | null;
  categories: Array<{ category: string; n: number }>;
} {
  const totals = db
    .prepare<[], { avg: number | null; last: string | null }>(
      "SELECT AVG(confidence) AS avg, MAX(updated_at) AS last FROM lore_entries WHERE deleted_at IS NULL"
    )
    .get();
  const categories = db
    .prepare<[], { category: string; n: number }>(
      `SELECT category, COUNT(*) AS n FROM lore_entries
       WHERE deleted_at IS NULL GROUP BY category ORDER BY category`
    )
    .all();
  return { average: totals?.avg ?? 0, lastUpdated: totals?.last ?? null, categories };
}

// -- Row mapping --

function loreToParams(lore: Lore): Record<string, string | number | Buffer | null> {
  return {
    id: lore.id,
    content: lore.content,
    context: lore.context,
    category: lore.category,
    confidence: lore.confidence,
    embedding: lore.embedding ? Buffer.from(lore.embedding) : null,
    embedding_status: lore.embedding_status,
    source_id: lore.source_id,
    sources: JSON.stringify(normalizeSources(lore.sources)),
    validation_count: lore.validation_count,
    last_validated_at: lore.last_validated_at,
    created_at: lore.created_at,
    updated_at: lore.updated_at,
    synced_at: lore.synced_at,
    deleted_at: lore.deleted_at,
    sync_error: lore.sync_error,
  };
}

export function rowToLore(row: LoreRow): Lore {
  return {
    id: row.id,
    content: row.content,
    context: row.context ?? null,
    category: parseCategory(row.category, row.id),
    confidence: row.confidence,
    embedding: row.embedding ? new Uint8Array(row.embedding) : null,
    embedding_status: parseEmbeddingStatus(row.embedding_status),
    source_id: row.source_id || null,
    sources: parseSources(row.sources),
    validation_count: row.validation_count,
    last_validated_at: row.last_validated_at ?? null,
    created_at: row.created_at,
    updated_at: row.updated_at,
    synced_at: row.synced_at ?? null,
    deleted_at: row.deleted_at ?? null,
    sync_error: row.sync_error ?? null,
  };
}

/** Dedupe and sort: sources are a set, order carries no meaning. */
export function normalizeSources(sources: readonly string[]): string[] {
  return [...new Set(sources.map((s) => s.trim()).filter(Boolean))].sort();
}

/** Accepts a JSON array or the older comma-joined form. */
export function parseSources(raw: string | null | undefined): string[] {
  if (!raw) return [];
  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) return [];
    return normalizeSources(parsed.filter((s): s is string => typeof s === "string"));
  }
  return normalizeSources(trimmed.split(","));
}

export function parseCategory(value: string, id: string): Category {
  if (!isCategory(value)) {
    throw new Error(`lore ${id} has unknown category "${value}"`);
  }
  return value;
}

/** "complete" is how the remote labels finished embeddings. */
export function parseEmbeddingStatus(value: string | null | undefined): EmbeddingStatus {
  if (value === "complete") return "ready";
  const match = EMBEDDING_STATUSES.find((s) => s === value);
  return match ?? "pending";
}
