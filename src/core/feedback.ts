import { NotFoundError } from "./errors.js";
import { isSessionRef, type SessionTracker } from "./session.js";
import type { LoreStore } from "./store.js";
import type { FeedbackOutcome } from "../types.js";

export interface FeedbackRequest {
  helpful?: string[];
  notRelevant?: string[];
  incorrect?: string[];
}

export interface FeedbackRouting {
  session: SessionTracker;
  registry: { open(storeId: string): Pick<LoreStore, "applyFeedback"> };
  /** Store for raw record ids (anything that is not an L<n> ref). */
  defaultStore: string;
}

export interface AppliedFeedback {
  ref: string;
  storeId: string;
  id: string;
  outcome: FeedbackOutcome;
  previous: number;
  current: number;
  validationCount: number;
}

export interface FeedbackBatchResult {
  updated: AppliedFeedback[];
  notFound: string[];
}

interface Routed {
  ref: string;
  loreId: string;
  outcome: FeedbackOutcome;
}

/**
 * Apply feedback given as session refs or raw ids.
 *
 * Every reference is routed to its store first; stores are then visited one
 * at a time in first-seen order. Unknown refs and missing records are
 * reported in notFound rather than failing the batch.
 */
export async function applyFeedbackBatch(
  request: FeedbackRequest,
  routing: FeedbackRouting
): Promise<FeedbackBatchResult> {
  const result: FeedbackBatchResult = { updated: [], notFound: [] };
  const byStore = new Map<string, Routed[]>();

  const outcomes: Array<[FeedbackOutcome, string[] | undefined]> = [
    ["helpful", request.helpful],
    ["not_relevant", request.notRelevant],
    ["incorrect", request.incorrect],
  ];

  for (const [outcome, refs] of outcomes) {
    for (const raw of refs ?? []) {
      const ref = raw.trim();
      if (!ref) continue;

      let storeId = routing.defaultStore;
      let loreId = ref;
      if (isSessionRef(ref)) {
        const entry = routing.session.resolve(ref);
        if (!entry) {
          result.notFound.push(ref);
          continue;
        }
        storeId = entry.storeId;
        loreId = entry.loreId;
      }

      const group = byStore.get(storeId) ?? [];
      group.push({ ref, loreId, outcome });
      byStore.set(storeId, group);
    }
  }

  for (const [storeId, items] of byStore) {
    const store = routing.registry.open(storeId);
    for (const item of items) {
      try {
        const update = await store.applyFeedback(item.loreId, item.outcome);
        result.updated.push({
          ref: item.ref,
          storeId,
          id: update.id,
          outcome: item.outcome,
          previous: update.previous,
          current: update.current,
          validationCount: update.validation_count,
        });
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        result.notFound.push(item.ref);
      }
    }
  }

  return result;
}
