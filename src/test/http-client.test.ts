import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { Readable } from "stream";
import { HttpSyncClient, truncateBody } from "../core/http-client.js";
import {
  InvalidStoreIdError,
  NotFoundError,
  RemoteError,
  ReservedStoreIdError,
  ValidationError,
} from "../core/errors.js";
import { makeLore } from "./helpers.js";

interface Call {
  url: string;
  init: RequestInit;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function stubFetch(respond: (call: Call) => Response | Promise<Response>): { calls: Call[]; fetch: typeof fetch } {
  const calls: Call[] = [];
  const impl: typeof fetch = async (input, init = {}) => {
    const call = { url: String(input), init };
    calls.push(call);
    return respond(call);
  };
  return { calls, fetch: impl };
}

function client(fetchImpl: typeof fetch, overrides: { sourceId?: string; timeoutMs?: number } = {}): HttpSyncClient {
  return new HttpSyncClient({
    baseUrl: "https://lore.example.test/",
    apiKey: "test-secret",
    sourceId: "laptop-1",
    fetch: fetchImpl,
    ...overrides,
  });
}

/** Resolves only when the request signal fires. */
function hangUntilAborted(call: Call): Promise<Response> {
  return new Promise((_, reject) => {
    const signal = call.init.signal;
    if (!signal) return reject(new Error("no signal"));
    signal.addEventListener("abort", () => reject(signal.reason));
  });
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

describe("HttpSyncClient", () => {
  it("requires a base URL and an API key", () => {
    assert.throws(() => new HttpSyncClient({ baseUrl: "https://lore.example.test", apiKey: " " }), ValidationError);
    assert.throws(() => new HttpSyncClient({ baseUrl: "", apiKey: "test-secret" }), ValidationError);
  });

  it("sends auth, user agent and source id headers", async () => {
    const stub = stubFetch(() => json({ status: "ok", embedding_model: "m1", version: "1.2.0" }));

    const health = await client(stub.fetch).healthCheck();

    assert.deepEqual(health, { status: "ok", embeddingModel: "m1", version: "1.2.0" });
    const [call] = stub.calls;
    assert.equal(call.url, "https://lore.example.test/api/v1/health");
    assert.equal(call.init.method, "GET");
    const headers = new Headers(call.init.headers);
    assert.equal(headers.get("authorization"), "Bearer test-secret");
    assert.equal(headers.get("user-agent"), "loresync/0.1.0");
    assert.equal(headers.get("x-loresync-source-id"), "laptop-1");
    assert.equal(headers.get("content-type"), null);
  });

  it("omits the source id header when it is blank", async () => {
    const stub = stubFetch(() => json({ status: "ok" }));
    await client(stub.fetch, { sourceId: "  " }).healthCheck();
    assert.equal(new Headers(stub.calls[0].init.headers).get("x-loresync-source-id"), null);
  });

  it("streams the snapshot body from the encoded store path", async () => {
    const stub = stubFetch(() => new Response("snapshot-data"));

    const stream = await client(stub.fetch).snapshot("org/team");

    assert.equal(stub.calls[0].url, "https://lore.example.test/api/v1/stores/org%2Fteam/sync/snapshot");
    assert.equal(await readAll(stream), "snapshot-data");
  });

  it("reports status and a truncated body on server errors", async () => {
    const stub = stubFetch(() => new Response("x".repeat(300), { status: 503 }));

    await assert.rejects(client(stub.fetch).snapshot("team-a"), (err: unknown) => {
      assert.ok(err instanceof RemoteError);
      assert.equal(err.statusCode, 503);
      assert.equal(err.message, `remote snapshot failed (HTTP 503): ${"x".repeat(200)}...`);
      return true;
    });
  });

  it("never echoes the API key in errors", async () => {
    const stub = stubFetch(() => new Response("bad key test-secret", { status: 401 }));

    await assert.rejects(client(stub.fetch).healthCheck(), {
      message: "remote health_check failed (HTTP 401): bad key [redacted]",
    });
  });

  it("wraps network failures without a status", async () => {
    const stub = stubFetch(() => {
      throw new TypeError("fetch failed");
    });

    await assert.rejects(client(stub.fetch).healthCheck(), (err: unknown) => {
      assert.ok(err instanceof RemoteError);
      assert.equal(err.statusCode, undefined);
      assert.equal(err.message, "remote health_check failed: fetch failed");
      return true;
    });
  });

  it("times out slow requests", async () => {
    const stub = stubFetch(hangUntilAborted);

    await assert.rejects(client(stub.fetch, { timeoutMs: 20 }).healthCheck(), {
      message: "remote health_check failed: timed out after 20ms",
    });
  });

  it("stops when the caller aborts", async () => {
    const stub = stubFetch(hangUntilAborted);
    const controller = new AbortController();

    const pending = client(stub.fetch).healthCheck(controller.signal);
    controller.abort();

    await assert.rejects(pending, { message: "remote health_check failed: aborted" });
  });

  it("pages deltas and maps wire records", async () => {
    const stub = stubFetch(() =>
      json({
        changes: [
          {
            id: "r1",
            content: "Remote insight",
            category: "TESTING_STRATEGY",
            confidence: 0.7,
            embedding: "AQID",
            embedding_status: "complete",
            sources: ["b.md", "a.md"],
            created_at: "2026-01-01T00:00:00.000Z",
          },
        ],
        deleted_ids: ["r2"],
        next_cursor: "seq:11",
      })
    );

    const page = await client(stub.fetch).delta("team-a", "seq:10", 50);

    assert.equal(stub.calls[0].url, "https://lore.example.test/api/v1/stores/team-a/sync/delta?after=seq%3A10&limit=50");
    assert.deepEqual(page.deletedIds, ["r2"]);
    assert.equal(page.nextCursor, "seq:11");
    assert.deepEqual(page.changes, [
      {
        id: "r1",
        content: "Remote insight",
        context: null,
        category: "TESTING_STRATEGY",
        confidence: 0.7,
        embedding: new Uint8Array([1, 2, 3]),
        embedding_status: "ready",
        source_id: null,
        sources: ["a.md", "b.md"],
        validation_count: 0,
        last_validated_at: null,
        created_at: "2026-01-01T00:00:00.000Z",
        updated_at: "2026-01-01T00:00:00.000Z",
        synced_at: null,
        deleted_at: null,
        sync_error: null,
      },
    ]);
  });

  it("skips unreadable changes and keeps the rest of the page", async () => {
    const stub = stubFetch(() =>
      json({
        changes: [
          {
            id: "r-good",
            content: "Still readable",
            category: "TESTING_STRATEGY",
            confidence: 1.02,
            created_at: "2026-01-02T00:00:00.000Z",
          },
          { id: "r-bad", content: "Old kind", category: "RETIRED_KIND", confidence: 0.5, created_at: "2026-01-02T00:00:00.000Z" },
          { content: "No id" },
        ],
        next_cursor: "seq:12",
      })
    );

    const page = await client(stub.fetch).delta("team-a", "seq:11", 50);

    assert.deepEqual(
      page.changes.map((l) => [l.id, l.confidence]),
      [["r-good", 1]]
    );
    assert.deepEqual(
      page.skipped?.map((s) => s.id),
      ["r-bad", "(unknown)"]
    );
    assert.match(page.skipped?.[0].message ?? "", /^category: /);
    assert.equal(page.nextCursor, "seq:12");
  });

  it("pushes a snake_case batch without embeddings", async () => {
    const stub = stubFetch(() => json({ accepted: ["lore-1"], feedback_applied: [3] }));

    const result = await client(stub.fetch).push("team-a", {
      pushId: "push-1",
      sourceId: "laptop-1",
      schemaVersion: "2",
      lore: [makeLore({ embedding: new Uint8Array([1, 2]) })],
      deletions: ["old-1"],
      feedback: [{ queueId: 3, loreId: "lore-1", outcome: "helpful" }],
    });

    assert.deepEqual(result, { accepted: ["lore-1"], merged: [], rejected: [], errors: [], feedbackApplied: [3] });
    const [call] = stub.calls;
    assert.equal(call.init.method, "POST");
    assert.equal(new Headers(call.init.headers).get("content-type"), "application/json");
    assert.equal(typeof call.init.body, "string");
    assert.deepEqual(JSON.parse(String(call.init.body)), {
      push_id: "push-1",
      source_id: "laptop-1",
      schema_version: "2",
      lore: [
        {
          id: "lore-1",
          content: "Prepared statements are cached per connection",
          context: null,
          category: "DEPENDENCY_BEHAVIOR",
          confidence: 0.5,
          embedding_status: "pending",
          source_id: null,
          sources: [],
          validation_count: 0,
          last_validated_at: null,
          created_at: "2026-01-01T00:00:00.000Z",
          updated_at: "2026-01-01T00:00:00.000Z",
          deleted_at: null,
        },
      ],
      deletions: ["old-1"],
      feedback: [{ queue_id: 3, lore_id: "lore-1", outcome: "helpful" }],
    });
  });

  it("rejects malformed responses", async () => {
    const empty = stubFetch(() => json({}));
    await assert.rejects(client(empty.fetch).healthCheck(), {
      message: "remote health_check failed: unexpected response: status: Required",
    });

    const garbage = stubFetch(() => new Response("not json"));
    await assert.rejects(client(garbage.fetch).healthCheck(), /invalid JSON response/);
  });

  describe("store management", () => {
    it("creates a store", async () => {
      const stub = stubFetch(() => json({ id: "org/team", record_count: 0 }, 201));

      const created = await client(stub.fetch).createStore("org/team", "Team lore");

      assert.deepEqual(created, { id: "org/team", description: "", recordCount: 0, lastAccessed: "" });
      assert.equal(stub.calls[0].url, "https://lore.example.test/api/v1/stores");
      assert.deepEqual(JSON.parse(String(stub.calls[0].init.body)), { id: "org/team", description: "Team lore" });
    });

    it("refuses reserved and invalid ids without a request", async () => {
      const stub = stubFetch(() => json({}));
      const c = client(stub.fetch);

      await assert.rejects(c.createStore("default"), ReservedStoreIdError);
      await assert.rejects(c.deleteStore("default"), ReservedStoreIdError);
      await assert.rejects(c.deleteStore("_system"), ReservedStoreIdError);
      await assert.rejects(c.createStore("Not Valid"), InvalidStoreIdError);
      assert.equal(stub.calls.length, 0);
    });

    it("deletes with confirmation", async () => {
      const stub = stubFetch(() => new Response(null, { status: 204 }));

      await client(stub.fetch).deleteStore("org/team");

      assert.equal(stub.calls[0].url, "https://lore.example.test/api/v1/stores/org%2Fteam?confirm=true");
      assert.equal(stub.calls[0].init.method, "DELETE");
    });

    it("maps a missing store to NotFoundError", async () => {
      const stub = stubFetch(() => new Response("no such store", { status: 404 }));

      await assert.rejects(client(stub.fetch).storeInfo("org/team"), (err: unknown) => {
        assert.ok(err instanceof NotFoundError);
        assert.equal(err.message, "store not found: org/team");
        return true;
      });
    });

    it("maps store info with missing sections", async () => {
      const stub = stubFetch(() =>
        json({
          id: "org/team",
          description: "Team lore",
          size_bytes: 4096,
          stats: { total_lore: 10, active_lore: 8, deleted_lore: 2, quality_stats: { average_confidence: 0.62 } },
        })
      );

      const info = await client(stub.fetch).storeInfo("org/team");

      assert.equal(info.sizeBytes, 4096);
      assert.equal(info.stats.activeLore, 8);
      assert.equal(info.stats.averageConfidence, 0.62);
      assert.equal(info.stats.validatedCount, 0);
      assert.deepEqual(info.stats.embeddings, { complete: 0, pending: 0, failed: 0 });
      assert.deepEqual(info.stats.categories, {});
    });

    it("filters the store list by prefix", async () => {
      const stub = stubFetch(() => json({ stores: [{ id: "org/a" }, { id: "org/b" }, { id: "other" }] }));

      const stores = await client(stub.fetch).listStores("org/");

      assert.deepEqual(
        stores.map((s) => s.id),
        ["org/a", "org/b"]
      );
    });
  });
});

describe("truncateBody", () => {
  it("leaves short bodies alone", () => {
    assert.equal(truncateBody("short"), "short");
    assert.equal(truncateBody("abcdef", 3), "abc...");
  });
});
