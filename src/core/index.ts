export * from "../types.js";
export * from "./errors.js";
export * from "./store-id.js";
export * from "./paths.js";
export { RWLock } from "./lock.js";
export { loadConfig, type LoreSyncConfig, type RemoteConfig } from "./config.js";
export { setDebug, logInfo, logWarn, logDebug } from "./log.js";
export {
  LoreStore,
  adjustConfidence,
  META_DELTA_CURSOR,
  META_DESCRIPTION,
  META_EMBEDDING_MODEL,
  META_LAST_SYNC,
  META_SOURCE_ID,
  type DeltaPage,
  type LoreStoreOptions,
  type RecordVersion,
  type SnapshotSource,
  type SyncErrorEntry,
} from "./store.js";
export { StoreRegistry } from "./registry.js";
export type {
  RemoteSyncClient,
  HealthStatus,
  PushBatch,
  PushResult,
  DeltaResult,
  SkippedChange,
  FeedbackPushItem,
  StoreSummary,
  StoreInfo,
} from "./remote.js";
export { HttpSyncClient, type HttpSyncClientOptions } from "./http-client.js";
export {
  SyncEngine,
  type SyncStore,
  type SyncState,
  type SyncEngineOptions,
  type BootstrapResult,
  type PushSummary,
  type PullSummary,
  type PullOptions,
  type RunOptions,
} from "./sync.js";
export { SessionTracker, isSessionRef, parseSessionRef, type SessionRef } from "./session.js";
export { applyFeedbackBatch, type FeedbackRequest, type FeedbackBatchResult, type AppliedFeedback } from "./feedback.js";
