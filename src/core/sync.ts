import { v4 as uuidv4 } from "uuid";
import {
  ModelMismatchError,
  OfflineError,
  RemoteError,
  SyncBusyError,
  SyncPhaseError,
  type SyncOperation,
} from "./errors.js";
import { logDebug, logWarn } from "./log.js";
import { validateStoreId } from "./store-id.js";
import { SCHEMA_VERSION } from "./db.js";
import {
  META_DELTA_CURSOR,
  META_EMBEDDING_MODEL,
  META_LAST_SYNC,
  type DeltaPage,
  type RecordVersion,
  type SnapshotSource,
  type SyncErrorEntry,
} from "./store.js";
import { DEFAULT_DELTA_LIMIT, DEFAULT_PUSH_BATCH } from "./config.js";
import type { FeedbackPushItem, RemoteSyncClient, SkippedChange } from "./remote.js";
import type { FeedbackQueueEntry, Lore } from "../types.js";

/** The part of a local store the engine drives. LoreStore implements it. */
export interface SyncStore {
  readonly sourceId: string;
  getMetadata(key: string): Promise<string>;
  setMetadata(key: string, value: string): Promise<void>;
  replaceFromSnapshot(source: SnapshotSource, options?: { signal?: AbortSignal }): Promise<number>;
  unsynced(): Promise<Lore[]>;
  unsyncedDeletions(): Promise<string[]>;
  markSynced(ids: string[], syncedAt: string): Promise<void>;
  markVersionsSynced(versions: RecordVersion[], syncedAt: string): Promise<void>;
  recordSyncErrors(errors: SyncErrorEntry[]): Promise<void>;
  pendingFeedback(): Promise<FeedbackQueueEntry[]>;
  markFeedbackSynced(ids: number[]): Promise<void>;
  applyDeltaPage(page: DeltaPage): Promise<{ upserted: number; deleted: number }>;
}

export type SyncState = "idle" | "bootstrapping" | "pushing" | "pulling";

export interface SyncEngineOptions {
  openStore: (storeId: string) => SyncStore | Promise<SyncStore>;
  /** Absent means offline: every operation fails with OfflineError. */
  client?: RemoteSyncClient | null;
  /** Sent with each push; defaults to the store's own source id. */
  sourceId?: string;
  batchSize?: number;
  deltaLimit?: number;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface PullOptions extends RunOptions {
  /** Start after this cursor instead of the stored one. */
  since?: string;
}

export interface BootstrapResult {
  storeId: string;
  records: number;
  embeddingModel: string;
  syncedAt: string;
}

export interface PushSummary {
  pushed: number;
  merged: number;
  deleted: number;
  rejected: SyncErrorEntry[];
  feedback: number;
}

export interface PullSummary {
  pages: number;
  upserted: number;
  deleted: number;
  /** Remote changes this client could not read; their pages still advance the cursor. */
  skipped: SkippedChange[];
  cursor: string;
}

type PushItem =
  | { kind: "lore"; lore: Lore }
  | { kind: "delete"; id: string }
  | { kind: "feedback"; entry: FeedbackQueueEntry };

/**
 * Bootstrap, push and pull between local stores and the remote service.
 *
 * One operation per store at a time; a second call while one runs fails
 * with SyncBusyError. Failures are wrapped in SyncPhaseError naming the
 * phase, except OfflineError and ModelMismatchError which surface as-is.
 * Nothing is retried here.
 */
export class SyncEngine {
  private readonly options: SyncEngineOptions;
  private readonly running = new Map<string, Exclude<SyncState, "idle">>();

  constructor(options: SyncEngineOptions) {
    this.options = options;
  }

  get online(): boolean {
    return Boolean(this.options.client);
  }

  state(storeId: string): SyncState {
    return this.running.get(storeId) ?? "idle";
  }

  async bootstrap(storeId: string, options: RunOptions = {}): Promise<BootstrapResult> {
    validateStoreId(storeId);
    const client = this.requireClient();
    const { signal } = options;

    return this.exclusive(storeId, "bootstrapping", async () => {
      const op: SyncOperation = "bootstrap";
      const store = await this.step(op, "open_store", false, () => this.openStore(storeId));
      const health = await this.step(op, "health_check", false, () => client.healthCheck(signal));

      const localModel = await this.step(op, "model_check", false, () => store.getMetadata(META_EMBEDDING_MODEL));
      if (localModel && localModel !== health.embeddingModel) {
        throw new ModelMismatchError(localModel, health.embeddingModel);
      }

      const snapshot = await this.step(op, "snapshot", false, () => client.snapshot(storeId, signal));
      const records = await this.step(op, "replace", false, () => store.replaceFromSnapshot(snapshot, { signal }));

      // The data is replaced from here on; metadata failures report mutated = true.
      await this.step(op, "set_embedding_model", true, () =>
        store.setMetadata(META_EMBEDDING_MODEL, health.embeddingModel)
      );
      const syncedAt = this.timestamp();
      await this.step(op, "set_last_sync", true, () => store.setMetadata(META_LAST_SYNC, syncedAt));

      logDebug(`bootstrap ${storeId}: ${records} record(s), model "${health.embeddingModel}"`);
      return { storeId, records, embeddingModel: health.embeddingModel, syncedAt };
    });
  }

  async push(storeId: string, options: RunOptions = {}): Promise<PushSummary> {
    validateStoreId(storeId);
    const client = this.requireClient();
    const { signal } = options;

    return this.exclusive(storeId, "pushing", async () => {
      const op: SyncOperation = "push";
      const store = await this.step(op, "open_store", false, () => this.openStore(storeId));
      const items = await this.step(op, "collect", false, () => collectPushItems(store));

      const summary: PushSummary = { pushed: 0, merged: 0, deleted: 0, rejected: [], feedback: 0 };
      if (items.length === 0) {
        logDebug(`push ${storeId}: nothing to push`);
        return summary;
      }

      const storedVersion = await this.step(op, "collect", false, () => store.getMetadata("schema_version"));
      const schemaVersion = storedVersion || SCHEMA_VERSION;
      const sourceId = this.options.sourceId ?? store.sourceId;
      const batchSize = this.options.batchSize ?? DEFAULT_PUSH_BATCH;
      let mutated = false;

      for (let i = 0; i < items.length; i += batchSize) {
        const chunk = items.slice(i, i + batchSize);
        const lore = chunk.flatMap((item) => (item.kind === "lore" ? [item.lore] : []));
        const deletions = chunk.flatMap((item) => (item.kind === "delete" ? [item.id] : []));
        const feedback = chunk.flatMap((item): FeedbackPushItem[] =>
          item.kind === "feedback"
            ? [{ queueId: item.entry.id, loreId: item.entry.lore_id, outcome: item.entry.outcome }]
            : []
        );

        const result = await this.step(op, "send", mutated, () =>
          client.push(storeId, { pushId: uuidv4(), sourceId, schemaVersion, lore, deletions, feedback }, signal)
        );

        // Only ids from this batch count; anything else the server echoes is ignored.
        const loreVersions = new Map(lore.map((l) => [l.id, l.updated_at]));
        const deletionIds = new Set(deletions);
        const sent = (id: string) => loreVersions.has(id) || deletionIds.has(id);
        const accepted = result.accepted.filter(sent);
        const merged = result.merged.filter(sent);
        const syncedAt = this.timestamp();

        const versions = [...accepted, ...merged].flatMap((id): RecordVersion[] => {
          const updatedAt = loreVersions.get(id);
          return updatedAt === undefined ? [] : [{ id, updatedAt }];
        });
        const deleted = [...accepted, ...merged].filter((id) => deletionIds.has(id));

        await this.step(op, "mark_synced", mutated, async () => {
          await store.markVersionsSynced(versions, syncedAt);
          await store.markSynced(deleted, syncedAt);
        });
        mutated = true;

        const rejectedIds = new Set([...result.rejected, ...result.errors.map((e) => e.id)]);
        const rejected = rejectedEntries([...rejectedIds].filter(sent), result.errors);
        await this.step(op, "record_errors", mutated, () => store.recordSyncErrors(rejected));

        const queueIds = new Set(feedback.map((f) => f.queueId));
        const applied = result.feedbackApplied.filter((id) => queueIds.has(id));
        await this.step(op, "ack_feedback", mutated, () => store.markFeedbackSynced(applied));

        summary.pushed += accepted.filter((id) => loreVersions.has(id)).length;
        summary.merged += merged.filter((id) => loreVersions.has(id)).length;
        summary.deleted += deleted.length;
        summary.rejected.push(...rejected);
        summary.feedback += applied.length;
      }

      logDebug(
        `push ${storeId}: ${summary.pushed} accepted, ${summary.merged} merged, ` +
          `${summary.rejected.length} rejected, ${summary.feedback} feedback`
      );
      return summary;
    });
  }

  async pull(storeId: string, options: PullOptions = {}): Promise<PullSummary> {
    validateStoreId(storeId);
    const client = this.requireClient();
    const { signal } = options;

    return this.exclusive(storeId, "pulling", async () => {
      const op: SyncOperation = "pull";
      const store = await this.step(op, "open_store", false, () => this.openStore(storeId));
      let cursor =
        options.since ?? (await this.step(op, "read_cursor", false, () => store.getMetadata(META_DELTA_CURSOR)));
      const limit = this.options.deltaLimit ?? DEFAULT_DELTA_LIMIT;
      const summary: PullSummary = { pages: 0, upserted: 0, deleted: 0, skipped: [], cursor };
      let mutated = false;

      for (;;) {
        const after = cursor;
        const page = await this.step(op, "delta", mutated, () => client.delta(storeId, after, limit, signal));
        const skipped = page.skipped ?? [];
        if (page.changes.length === 0 && page.deletedIds.length === 0 && skipped.length === 0) break;

        if (page.nextCursor === after) {
          throw new SyncPhaseError(
            op,
            "delta",
            mutated,
            new RemoteError("delta", `cursor did not advance past "${after}"`)
          );
        }

        const applied = await this.step(op, "apply", mutated, () => {
          signal?.throwIfAborted();
          return store.applyDeltaPage(page);
        });
        mutated = true;
        cursor = page.nextCursor;
        summary.pages += 1;
        summary.upserted += applied.upserted;
        summary.deleted += applied.deleted;
        summary.skipped.push(...skipped);
        for (const s of skipped) {
          logWarn(`pull ${storeId}: skipped change ${s.id}: ${s.message}`);
        }
      }

      const syncedAt = this.timestamp();
      await this.step(op, "set_last_sync", mutated, () => store.setMetadata(META_LAST_SYNC, syncedAt));
      summary.cursor = cursor;

      logDebug(`pull ${storeId}: ${summary.pages} page(s), ${summary.upserted} upserted, ${summary.deleted} deleted`);
      return summary;
    });
  }

  /** Push, then pull. Each half is its own run. */
  async sync(storeId: string, options: RunOptions = {}): Promise<{ push: PushSummary; pull: PullSummary }> {
    const push = await this.push(storeId, options);
    const pull = await this.pull(storeId, options);
    return { push, pull };
  }

  private requireClient(): RemoteSyncClient {
    if (!this.options.client) throw new OfflineError();
    return this.options.client;
  }

  private async openStore(storeId: string): Promise<SyncStore> {
    return this.options.openStore(storeId);
  }

  private timestamp(): string {
    return (this.options.now?.() ?? new Date()).toISOString();
  }

  private async exclusive<T>(storeId: string, state: Exclude<SyncState, "idle">, fn: () => Promise<T>): Promise<T> {
    const current = this.running.get(storeId);
    if (current) throw new SyncBusyError(storeId, current);

    this.running.set(storeId, state);
    try {
      return await fn();
    } finally {
      this.running.delete(storeId);
    }
  }

  private async step<T>(operation: SyncOperation, phase: string, mutated: boolean, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof OfflineError || err instanceof ModelMismatchError || err instanceof SyncPhaseError) {
        throw err;
      }
      throw new SyncPhaseError(operation, phase, mutated, err);
    }
  }
}

async function collectPushItems(store: SyncStore): Promise<PushItem[]> {
  const records = await store.unsynced();
  const deletions = await store.unsyncedDeletions();
  const feedback = await store.pendingFeedback();
  return [
    ...records.map((lore): PushItem => ({ kind: "lore", lore })),
    ...deletions.map((id): PushItem => ({ kind: "delete", id })),
    ...feedback.map((entry): PushItem => ({ kind: "feedback", entry })),
  ];
}

function rejectedEntries(ids: string[], errors: Array<{ id: string; message: string }>): SyncErrorEntry[] {
  const messages = new Map(errors.map((e) => [e.id, e.message]));
  return ids.map((id) => ({ id, message: messages.get(id) ?? "rejected by server" }));
}
