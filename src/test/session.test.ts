import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { SessionTracker, isSessionRef, parseSessionRef } from "../core/session.js";

describe("session", () => {
  it("allocates increasing refs across stores", () => {
    const session = new SessionTracker();
    assert.equal(session.track("team-a", "x"), "L1");
    assert.equal(session.track("team-b", "y"), "L2");
    assert.equal(session.track("team-a", "z"), "L3");
    assert.equal(session.count(), 3);
  });

  it("returns the existing ref for a tracked pair", () => {
    const session = new SessionTracker();
    const ref = session.track("team-a", "x");
    session.track("team-a", "y");
    assert.equal(session.track("team-a", "x"), ref);
    assert.equal(session.count(), 2);
  });

  it("keeps the same record id in different stores apart", () => {
    const session = new SessionTracker();
    const a = session.track("a", "x");
    const b = session.track("b", "x");
    assert.notEqual(a, b);
    assert.deepEqual(session.resolve(a), { ref: a, storeId: "a", loreId: "x" });
    assert.deepEqual(session.resolve(b), { ref: b, storeId: "b", loreId: "x" });
  });

  it("does not confuse ids whose concatenation collides", () => {
    const session = new SessionTracker();
    const first = session.track("ab", "c");
    const second = session.track("a", "bc");
    assert.notEqual(first, second);
  });

  it("refs never decrease over a long sequence", () => {
    const session = new SessionTracker();
    let last = 0;
    for (let i = 0; i < 50; i++) {
      const ref = session.track(`store-${i % 3}`, `lore-${i % 7}`);
      const n = parseSessionRef(ref);
      assert.ok(n !== null);
      if (n > last) last = n;
      else assert.equal(session.resolveByLore(`store-${i % 3}`, `lore-${i % 7}`), ref);
    }
    assert.equal(last, 21);
  });

  it("resolve and resolveByLore return null for unknown entries", () => {
    const session = new SessionTracker();
    assert.equal(session.resolve("L1"), null);
    assert.equal(session.resolveByLore("team-a", "x"), null);
  });

  it("all() returns a copy", () => {
    const session = new SessionTracker();
    session.track("team-a", "x");
    const snapshot = session.all();
    snapshot[0].loreId = "changed";
    snapshot.push({ ref: "L99", storeId: "s", loreId: "l" });
    assert.deepEqual(session.all(), [{ ref: "L1", storeId: "team-a", loreId: "x" }]);
  });

  it("clear() resets the table and the counter", () => {
    const session = new SessionTracker();
    session.track("team-a", "x");
    session.track("team-a", "y");
    session.clear();
    assert.equal(session.count(), 0);
    assert.equal(session.resolve("L1"), null);
    assert.equal(session.track("team-a", "y"), "L1");
  });

  it("parses refs", () => {
    assert.equal(parseSessionRef("L12"), 12);
    assert.equal(parseSessionRef("L0"), null);
    assert.equal(parseSessionRef("l1"), null);
    assert.equal(parseSessionRef("L1a"), null);
    assert.equal(isSessionRef("L7"), true);
    assert.equal(isSessionRef("0192f1c4-aaaa"), false);
  });
});
