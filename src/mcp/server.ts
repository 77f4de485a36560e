import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { applyFeedbackBatch } from "../core/feedback.js";
import { describeError, OfflineError, toErrorMessage } from "../core/errors.js";
import { logInfo, logWarn } from "../core/log.js";
import { SessionTracker } from "../core/session.js";
import { resolveStoreId } from "../core/store-id.js";
import { createContext, formatLore, type CliContext } from "../cli/util.js";
import { CATEGORIES } from "../types.js";
import { VERSION } from "../version.js";

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

function text(body: string): ToolResult {
  return { content: [{ type: "text" as const, text: body }] };
}

function failure(err: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: describeError(err) }], isError: true };
}

/**
 * Register the lore tools on `server`. One SessionTracker per server process:
 * refs handed out by lore_query are what lore_feedback accepts.
 */
export function registerLoreTools(server: McpServer, ctx: CliContext, session: SessionTracker): void {
  const target = (store?: string) => resolveStoreId(store, ctx.storeId);

  server.tool(
    "lore_record",
    "Record a lesson learned while working: a decision, a pattern that worked or failed, an edge case, a dependency quirk. Keep it to one insight per call.",
    {
      content: z.string().describe("The insight itself, in one or two sentences."),
      category: z.enum(CATEGORIES).describe("What kind of insight this is."),
      context: z.string().optional().describe("Where it applies: module, task or situation."),
      confidence: z.number().min(0).max(1).optional().describe("Initial confidence, 0-1. Defaults to 0.5."),
      sources: z.array(z.string()).optional().describe("Files, URLs or tickets backing the insight."),
      store: z.string().optional().describe("Store id. Defaults to the server's store."),
    },
    async ({ content, category, context, confidence, sources, store }) => {
      try {
        const storeId = target(store);
        const lore = await ctx.registry.open(storeId).record({
          content,
          category,
          context,
          confidence,
          sources,
          source_id: ctx.config.sourceId,
        });
        const ref = session.track(storeId, lore.id);
        return text(`Recorded ${ref} (${lore.id}) in ${storeId}`);
      } catch (err) {
        return failure(err);
      }
    }
  );

  server.tool(
    "lore_query",
    "Search recorded lore before starting a task. Results carry short refs (L1, L2, ...) to pass to lore_feedback.",
    {
      query: z.string().optional().describe("Words to look for in content or context."),
      k: z.number().int().min(1).max(50).optional().describe("Maximum results. Defaults to 5."),
      min_confidence: z.number().min(0).max(1).optional(),
      categories: z.array(z.enum(CATEGORIES)).optional(),
      store: z.string().optional().describe("Store id. Defaults to the server's store."),
    },
    async ({ query, k, min_confidence, categories, store }) => {
      try {
        const storeId = target(store);
        const results = await ctx.registry.open(storeId).query({
          text: query,
          k,
          minConfidence: min_confidence,
          categories,
        });
        if (results.length === 0) {
          return text(`No lore found in ${storeId}.`);
        }
        const blocks = results.map((lore) => formatLore(lore, session.track(storeId, lore.id)));
        return text(`${results.length} result(s) from ${storeId}:\n\n${blocks.join("\n\n")}`);
      } catch (err) {
        return failure(err);
      }
    }
  );

  server.tool(
    "lore_feedback",
    "Report which lore helped. Pass refs from lore_query (L1, L2) or raw ids. Helpful raises confidence, incorrect lowers it.",
    {
      helpful: z.array(z.string()).optional(),
      not_relevant: z.array(z.string()).optional(),
      incorrect: z.array(z.string()).optional(),
      store: z.string().optional().describe("Store for raw ids. Refs carry their own store."),
    },
    async ({ helpful, not_relevant, incorrect, store }) => {
      try {
        const result = await applyFeedbackBatch(
          { helpful, notRelevant: not_relevant, incorrect },
          { session, registry: ctx.registry, defaultStore: target(store) }
        );
        const lines = result.updated.map(
          (u) => `${u.ref} (${u.storeId}): ${u.outcome} ${u.previous.toFixed(2)} -> ${u.current.toFixed(2)}`
        );
        if (result.notFound.length > 0) {
          lines.push(`Not found: ${result.notFound.join(", ")}`);
        }
        return text(lines.length > 0 ? lines.join("\n") : "No feedback given.");
      } catch (err) {
        return failure(err);
      }
    }
  );

  server.tool(
    "lore_sync",
    "Synchronize a store with the remote service.",
    {
      direction: z.enum(["push", "pull", "both", "bootstrap"]).optional().describe("Defaults to both."),
      store: z.string().optional(),
    },
    async ({ direction, store }) => {
      try {
        const storeId = target(store);
        switch (direction ?? "both") {
          case "bootstrap": {
            const r = await ctx.engine.bootstrap(storeId);
            return text(`Bootstrapped ${storeId}: ${r.records} record(s), model "${r.embeddingModel}"`);
          }
          case "push": {
            const p = await ctx.engine.push(storeId);
            return text(`Pushed ${storeId}: ${p.pushed} accepted, ${p.merged} merged, ${p.rejected.length} rejected`);
          }
          case "pull": {
            const p = await ctx.engine.pull(storeId);
            return text(
              `Pulled ${storeId}: ${p.upserted} upserted, ${p.deleted} deleted, ${p.skipped.length} skipped`
            );
          }
          default: {
            const { push, pull } = await ctx.engine.sync(storeId);
            return text(
              `Synced ${storeId}: pushed ${push.pushed} (${push.rejected.length} rejected), ` +
                `pulled ${pull.upserted} upserted and ${pull.deleted} deleted`
            );
          }
        }
      } catch (err) {
        return failure(err);
      }
    }
  );

  server.tool(
    "lore_store_list",
    "List stores: local ones always, remote ones when a remote is configured.",
    {
      prefix: z.string().optional(),
    },
    async ({ prefix }) => {
      try {
        const local = ctx.registry.listLocal().filter((id) => !prefix || id.startsWith(prefix));
        const lines = [`Local: ${local.length > 0 ? local.join(", ") : "(none)"}`];
        if (ctx.client) {
          const remote = await ctx.client.listStores(prefix);
          lines.push(`Remote: ${remote.length > 0 ? remote.map((s) => `${s.id} (${s.recordCount})`).join(", ") : "(none)"}`);
        } else {
          lines.push("Remote: offline");
        }
        return text(lines.join("\n"));
      } catch (err) {
        return failure(err);
      }
    }
  );

  server.tool(
    "lore_store_info",
    "Statistics for one store. Uses the remote when configured, the local copy otherwise.",
    {
      store: z.string().optional(),
    },
    async ({ store }) => {
      try {
        const storeId = target(store);
        if (!ctx.client) {
          const stats = await ctx.registry.open(storeId).detailedStats();
          return text(
            `${storeId} (local): ${stats.lore_count} lore, average confidence ` +
              `${stats.average_confidence.toFixed(2)}, last updated ${stats.last_updated ?? "never"}`
          );
        }
        const info = await ctx.client.storeInfo(storeId);
        return text(
          `${info.id}: ${info.stats.activeLore} active, ${info.stats.deletedLore} deleted, ` +
            `average confidence ${info.stats.averageConfidence.toFixed(2)}`
        );
      } catch (err) {
        return failure(err);
      }
    }
  );
}

export async function startMcpServer(options: { store?: string } = {}): Promise<void> {
  let ctx: CliContext;
  try {
    ctx = createContext(options.store);
  } catch (err) {
    process.stderr.write(`loresync: ${describeError(err)}\n`);
    process.exit(1);
  }

  const session = new SessionTracker();
  const server = new McpServer(
    { name: "loresync", version: VERSION },
    {
      instructions:
        "loresync keeps lessons learned across sessions. Query lore before a task, record new lore when you learn something, and report feedback on the refs you used.",
    }
  );
  registerLoreTools(server, ctx, session);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`serving store ${ctx.storeId} (${ctx.client ? "online" : "offline"})`);

  // ── Background push ───────────────────────────────
  let syncTimer: ReturnType<typeof setInterval> | null = null;
  if (ctx.client && ctx.config.syncIntervalMs > 0) {
    syncTimer = setInterval(() => {
      void pushOpenStores(ctx);
    }, ctx.config.syncIntervalMs);
    logInfo(`auto-push every ${ctx.config.syncIntervalMs / 1000}s`);
  }

  async function shutdown() {
    if (syncTimer) clearInterval(syncTimer);
    await pushOpenStores(ctx);
    await ctx.registry.closeAll();
    process.exit(0);
  }
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

async function pushOpenStores(ctx: CliContext): Promise<void> {
  if (!ctx.client) return;
  for (const storeId of ctx.registry.openIds()) {
    try {
      const summary = await ctx.engine.push(storeId);
      if (summary.pushed + summary.merged + summary.deleted + summary.feedback > 0) {
        logInfo(`pushed ${storeId}: ${summary.pushed} accepted, ${summary.merged} merged`);
      }
    } catch (err) {
      if (err instanceof OfflineError) return;
      logWarn(`push ${storeId} failed, will retry: ${toErrorMessage(err)}`);
    }
  }
}
