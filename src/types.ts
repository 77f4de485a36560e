export const CATEGORIES = [
  "ARCHITECTURAL_DECISION",
  "PATTERN_OUTCOME",
  "INTERFACE_LESSON",
  "EDGE_CASE_DISCOVERY",
  "IMPLEMENTATION_FRICTION",
  "TESTING_STRATEGY",
  "DEPENDENCY_BEHAVIOR",
  "PERFORMANCE_INSIGHT",
] as const;

export type Category = (typeof CATEGORIES)[number];

export const EMBEDDING_STATUSES = ["pending", "ready", "failed"] as const;

export type EmbeddingStatus = (typeof EMBEDDING_STATUSES)[number];

export const FEEDBACK_OUTCOMES = ["helpful", "not_relevant", "incorrect"] as const;

export type FeedbackOutcome = (typeof FEEDBACK_OUTCOMES)[number];

export interface Lore {
  id: string; // UUIDv7, sorts by creation time
  content: string;
  context: string | null;
  category: Category;
  confidence: number; // [0, 1]
  embedding: Uint8Array | null;
  embedding_status: EmbeddingStatus;
  source_id: string | null;
  sources: string[]; // set semantics, kept sorted
  validation_count: number;
  last_validated_at: string | null; // ISO 8601
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601
  synced_at: string | null; // null = dirty
  deleted_at: string | null; // tombstone
  sync_error: string | null; // last rejection reported by the remote
}

export interface FeedbackQueueEntry {
  id: number;
  lore_id: string;
  outcome: FeedbackOutcome;
  queued_at: string;
}

export interface FeedbackUpdate {
  id: string;
  previous: number;
  current: number;
  validation_count: number;
}

export interface RecordInput {
  content: string;
  category: Category;
  context?: string;
  confidence?: number;
  source_id?: string;
  sources?: string[];
}

export interface LorePatch {
  content?: string;
  context?: string | null;
  category?: Category;
  confidence?: number;
}

export interface QueryParams {
  text?: string;
  k?: number;
  minConfidence?: number;
  categories?: Category[];
}

export interface StoreStats {
  lore_count: number;
  pending_sync: number;
  pending_feedback: number;
  last_sync: string;
  schema_version: string;
}

export interface DetailedStats {
  lore_count: number;
  average_confidence: number;
  category_distribution: Partial<Record<Category, number>>;
  last_updated: string | null;
}

// ── Confidence rules ─────────────────────────────────────

export const CONFIDENCE_DEFAULT = 0.5;
export const CONFIDENCE_HELPFUL_DELTA = 0.08;
export const CONFIDENCE_INCORRECT_DELTA = -0.15;

export const MAX_CONTENT_LENGTH = 4000;
export const MAX_CONTEXT_LENGTH = 1000;

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export function isFeedbackOutcome(value: string): value is FeedbackOutcome {
  return (FEEDBACK_OUTCOMES as readonly string[]).includes(value);
}
