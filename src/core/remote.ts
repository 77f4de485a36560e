import type { Readable } from "stream";
import { z } from "zod";
import { parseEmbeddingStatus, normalizeSources } from "./db.js";
import { CATEGORIES, type FeedbackOutcome, type Lore } from "../types.js";

// ── Capability types ────────────────────────────────────

export interface HealthStatus {
  status: string;
  embeddingModel: string;
  version: string;
}

export interface FeedbackPushItem {
  /** Local feedback_queue id, echoed back in feedbackApplied. */
  queueId: number;
  loreId: string;
  outcome: FeedbackOutcome;
}

export interface PushBatch {
  pushId: string;
  sourceId: string;
  schemaVersion: string;
  lore: Lore[];
  deletions: string[];
  feedback: FeedbackPushItem[];
}

export interface PushResult {
  accepted: string[];
  merged: string[];
  rejected: string[];
  errors: Array<{ id: string; message: string }>;
  feedbackApplied: number[];
}

export interface SkippedChange {
  id: string;
  message: string;
}

export interface DeltaResult {
  changes: Lore[];
  deletedIds: string[];
  nextCursor: string;
  /** Changes that failed validation; absent when every change was readable. */
  skipped?: SkippedChange[];
}

export interface StoreSummary {
  id: string;
  description: string;
  recordCount: number;
  lastAccessed: string;
}

export interface StoreInfo {
  id: string;
  description: string;
  created: string;
  lastAccessed: string;
  sizeBytes: number;
  stats: {
    totalLore: number;
    activeLore: number;
    deletedLore: number;
    embeddings: { complete: number; pending: number; failed: number };
    categories: Record<string, number>;
    averageConfidence: number;
    validatedCount: number;
    uniqueSourceCount: number;
    statsAsOf: string;
  };
}

/**
 * What the sync engine needs from the central service. Every call takes an
 * optional AbortSignal; implementations must stop work when it fires.
 */
export interface RemoteSyncClient {
  healthCheck(signal?: AbortSignal): Promise<HealthStatus>;
  /** Snapshot bytes (a SQLite database file) for the store. */
  snapshot(storeId: string, signal?: AbortSignal): Promise<Readable>;
  push(storeId: string, batch: PushBatch, signal?: AbortSignal): Promise<PushResult>;
  delta(storeId: string, after: string, limit: number, signal?: AbortSignal): Promise<DeltaResult>;
  listStores(prefix?: string, signal?: AbortSignal): Promise<StoreSummary[]>;
  createStore(storeId: string, description?: string, signal?: AbortSignal): Promise<StoreSummary>;
  deleteStore(storeId: string, signal?: AbortSignal): Promise<void>;
  storeInfo(storeId: string, signal?: AbortSignal): Promise<StoreInfo>;
}

// ── Wire schemas (snake_case JSON) ──────────────────────

const nullableText = z.string().nullable().optional().transform((v) => v || null);
const count = z.number().int().nonnegative().optional().default(0);

export const wireLoreSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  context: nullableText,
  category: z.enum(CATEGORIES),
  // Clamped: a remote value a hair outside [0, 1] is still the same record.
  confidence: z
    .number()
    .finite()
    .transform((c) => Math.min(1, Math.max(0, c))),
  /** base64; absent when the server did not send vectors */
  embedding: nullableText,
  embedding_status: nullableText,
  source_id: nullableText,
  sources: z.array(z.string()).nullable().optional(),
  validation_count: count,
  last_validated_at: nullableText,
  created_at: z.string().min(1),
  updated_at: nullableText,
  deleted_at: nullableText,
});

export type WireLore = z.input<typeof wireLoreSchema>;

export const healthSchema = z
  .object({
    status: z.string(),
    embedding_model: z.string().optional().default(""),
    version: z.string().optional().default(""),
  })
  .transform((h) => ({ status: h.status, embeddingModel: h.embedding_model, version: h.version }));

export const pushResultSchema = z
  .object({
    accepted: z.array(z.string()).optional().default([]),
    merged: z.array(z.string()).optional().default([]),
    rejected: z.array(z.string()).optional().default([]),
    errors: z.array(z.object({ id: z.string(), message: z.string() })).optional().default([]),
    feedback_applied: z.array(z.number().int()).optional().default([]),
  })
  .transform(
    (r): PushResult => ({
      accepted: r.accepted,
      merged: r.merged,
      rejected: r.rejected,
      errors: r.errors,
      feedbackApplied: r.feedback_applied,
    })
  );

const wireIdSchema = z.object({ id: z.string().min(1) });

/** Records are checked one by one so a single unreadable change cannot stall the feed. */
export const deltaSchema = z
  .object({
    changes: z.array(z.unknown()).optional().default([]),
    deleted_ids: z.array(z.string()).optional().default([]),
    next_cursor: z.string(),
  })
  .transform((d): DeltaResult => {
    const changes: Lore[] = [];
    const skipped: SkippedChange[] = [];
    for (const raw of d.changes) {
      const parsed = wireLoreSchema.safeParse(raw);
      if (parsed.success) {
        changes.push(fromWireLore(parsed.data));
        continue;
      }
      const issue = parsed.error.issues[0];
      const id = wireIdSchema.safeParse(raw);
      skipped.push({
        id: id.success ? id.data.id : "(unknown)",
        message: `${issue.path.join(".")}: ${issue.message}`,
      });
    }
    return { changes, deletedIds: d.deleted_ids, nextCursor: d.next_cursor, skipped };
  });

export const storeSummarySchema = z
  .object({
    id: z.string(),
    description: z.string().nullable().optional(),
    record_count: count,
    last_accessed: z.string().nullable().optional(),
  })
  .transform(
    (s): StoreSummary => ({
      id: s.id,
      description: s.description ?? "",
      recordCount: s.record_count,
      lastAccessed: s.last_accessed ?? "",
    })
  );

export const storeListSchema = z.object({
  stores: z.array(storeSummarySchema).optional().default([]),
});

export const storeInfoSchema = z
  .object({
    id: z.string(),
    description: z.string().nullable().optional(),
    created: z.string().optional().default(""),
    last_accessed: z.string().optional().default(""),
    size_bytes: count,
    stats: z
      .object({
        total_lore: count,
        active_lore: count,
        deleted_lore: count,
        embedding_stats: z
          .object({ complete: count, pending: count, failed: count })
          .optional()
          .default({}),
        category_stats: z.record(z.number()).optional().default({}),
        quality_stats: z
          .object({ average_confidence: z.number().optional().default(0), validated_count: count })
          .optional()
          .default({}),
        unique_source_count: count,
        stats_as_of: z.string().optional().default(""),
      })
      .optional()
      .default({}),
  })
  .transform(
    (i): StoreInfo => ({
      id: i.id,
      description: i.description ?? "",
      created: i.created,
      lastAccessed: i.last_accessed,
      sizeBytes: i.size_bytes,
      stats: {
        totalLore: i.stats.total_lore,
        activeLore: i.stats.active_lore,
        deletedLore: i.stats.deleted_lore,
        embeddings: i.stats.embedding_stats,
        categories: i.stats.category_stats,
        averageConfidence: i.stats.quality_stats.average_confidence,
        validatedCount: i.stats.quality_stats.validated_count,
        uniqueSourceCount: i.stats.unique_source_count,
        statsAsOf: i.stats.stats_as_of,
      },
    })
  );

// ── Record mapping ──────────────────────────────────────

export function fromWireLore(wire: z.output<typeof wireLoreSchema>): Lore {
  return {
    id: wire.id,
    content: wire.content,
    context: wire.context,
    category: wire.category,
    confidence: wire.confidence,
    embedding: wire.embedding ? new Uint8Array(Buffer.from(wire.embedding, "base64")) : null,
    embedding_status: parseEmbeddingStatus(wire.embedding_status),
    source_id: wire.source_id,
    sources: normalizeSources(wire.sources ?? []),
    validation_count: wire.validation_count,
    last_validated_at: wire.last_validated_at,
    created_at: wire.created_at,
    updated_at: wire.updated_at ?? wire.created_at,
    synced_at: null,
    deleted_at: wire.deleted_at,
    sync_error: null,
  };
}

/** Push payload for one record. Embeddings stay local; the server computes its own. */
export function toWireLore(lore: Lore): WireLore {
  return {
    id: lore.id,
    content: lore.content,
    context: lore.context,
    category: lore.category,
    confidence: lore.confidence,
    embedding_status: lore.embedding_status,
    source_id: lore.source_id,
    sources: lore.sources,
    validation_count: lore.validation_count,
    last_validated_at: lore.last_validated_at,
    created_at: lore.created_at,
    updated_at: lore.updated_at,
    deleted_at: lore.deleted_at,
  };
}

export function toWirePushBatch(batch: PushBatch): Record<string, unknown> {
  return {
    push_id: batch.pushId,
    source_id: batch.sourceId,
    schema_version: batch.schemaVersion,
    lore: batch.lore.map(toWireLore),
    deletions: batch.deletions,
    feedback: batch.feedback.map((f) => ({ queue_id: f.queueId, lore_id: f.loreId, outcome: f.outcome })),
  };
}
