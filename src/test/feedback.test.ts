import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { applyFeedbackBatch } from "../core/feedback.js";
import { LocalIOError } from "../core/errors.js";
import { StoreRegistry } from "../core/registry.js";
import { SessionTracker } from "../core/session.js";
import { steppingClock, tempDir } from "./helpers.js";

describe("applyFeedbackBatch", () => {
  let dir: ReturnType<typeof tempDir>;
  let registry: StoreRegistry;

  beforeEach(() => {
    dir = tempDir();
    registry = new StoreRegistry(dir.path, { clock: steppingClock() });
  });

  afterEach(async () => {
    await registry.closeAll();
    dir.cleanup();
  });

  it("routes refs to their stores and raw ids to the default store", async () => {
    const a = await registry.open("team-a").record({ content: "a", category: "PATTERN_OUTCOME" });
    const b = await registry.open("team-b").record({ content: "b", category: "PATTERN_OUTCOME" });
    const c = await registry.open("team-a").record({ content: "c", category: "PATTERN_OUTCOME" });
    const session = new SessionTracker();
    assert.equal(session.track("team-a", a.id), "L1");
    assert.equal(session.track("team-b", b.id), "L2");

    const result = await applyFeedbackBatch(
      { helpful: ["L2", " ", "L9"], notRelevant: [c.id], incorrect: ["L1", "missing-id"] },
      { session, registry, defaultStore: "team-a" }
    );

    assert.deepEqual(result.updated, [
      { ref: "L2", storeId: "team-b", id: b.id, outcome: "helpful", previous: 0.5, current: 0.58, validationCount: 1 },
      { ref: c.id, storeId: "team-a", id: c.id, outcome: "not_relevant", previous: 0.5, current: 0.5, validationCount: 1 },
      { ref: "L1", storeId: "team-a", id: a.id, outcome: "incorrect", previous: 0.5, current: 0.35, validationCount: 1 },
    ]);
    assert.deepEqual(result.notFound, ["L9", "missing-id"]);
    assert.equal((await registry.open("team-b").get(b.id))?.confidence, 0.58);
    assert.equal((await registry.open("team-a").pendingFeedback()).length, 2);
  });

  it("returns an empty result for an empty request", async () => {
    const result = await applyFeedbackBatch({}, { session: new SessionTracker(), registry, defaultStore: "team-a" });
    assert.deepEqual(result, { updated: [], notFound: [] });
  });

  it("propagates store failures other than missing records", async () => {
    const broken = {
      open: () => ({
        applyFeedback: async () => {
          throw new LocalIOError("apply_feedback", new Error("disk full"));
        },
      }),
    };

    await assert.rejects(
      applyFeedbackBatch({ helpful: ["some-id"] }, { session: new SessionTracker(), registry: broken, defaultStore: "team-a" }),
      LocalIOError
    );
  });
});
