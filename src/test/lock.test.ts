import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RWLock } from "../core/lock.js";
import { deferred, nextTick } from "./helpers.js";

describe("lock", () => {
  it("lets readers share the lock", async () => {
    const lock = new RWLock();
    const gate = deferred();
    const a = lock.read(() => gate.promise);
    const b = lock.read(() => gate.promise);
    await nextTick();
    assert.equal(lock.activeReaders, 2);
    gate.resolve();
    await Promise.all([a, b]);
    assert.equal(lock.activeReaders, 0);
  });

  it("serves waiters in order, a queued writer blocking later readers", async () => {
    const lock = new RWLock();
    const log: string[] = [];
    const gate = deferred();

    const r1 = lock.read(async () => {
      log.push("r1 start");
      await gate.promise;
      log.push("r1 end");
    });
    const w = lock.write(() => {
      log.push("w");
    });
    const r2 = lock.read(() => {
      log.push("r2");
    });

    await nextTick();
    assert.deepEqual(log, ["r1 start"]);

    gate.resolve();
    await Promise.all([r1, w, r2]);
    assert.deepEqual(log, ["r1 start", "r1 end", "w", "r2"]);
  });

  it("keeps writers exclusive", async () => {
    const lock = new RWLock();
    let inside = 0;
    let maxInside = 0;
    const work = async () => {
      inside += 1;
      maxInside = Math.max(maxInside, inside);
      await nextTick();
      inside -= 1;
    };
    await Promise.all([lock.write(work), lock.write(work), lock.write(work)]);
    assert.equal(maxInside, 1);
  });

  it("releases the lock when the section throws", async () => {
    const lock = new RWLock();
    await assert.rejects(
      lock.write(() => {
        throw new Error("boom");
      }),
      /boom/
    );
    assert.equal(lock.isWriting, false);
    assert.equal(await lock.read(() => "ok"), "ok");
  });
});
