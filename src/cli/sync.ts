import { runWithContext } from "./util.js";
import type { PullSummary, PushSummary } from "../core/sync.js";

function printPush(summary: PushSummary): void {
  console.log(
    `Pushed: ${summary.pushed} accepted, ${summary.merged} merged, ${summary.deleted} deletion(s), ` +
      `${summary.feedback} feedback`
  );
  for (const r of summary.rejected) {
    console.log(`  rejected ${r.id}: ${r.message}`);
  }
}

function printPull(summary: PullSummary): void {
  console.log(
    `Pulled: ${summary.pages} page(s), ${summary.upserted} upserted, ${summary.deleted} deleted` +
      (summary.cursor ? ` (cursor ${summary.cursor})` : "")
  );
  for (const s of summary.skipped) {
    console.log(`  skipped ${s.id}: ${s.message}`);
  }
}

export async function syncBootstrapCommand(options: { store?: string }): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    const result = await ctx.engine.bootstrap(ctx.storeId);
    console.log(`Bootstrapped ${ctx.storeId}: ${result.records} record(s)`);
    console.log(`  Embedding model: ${result.embeddingModel || "(none)"}`);
    console.log(`  Last sync:       ${result.syncedAt}`);
  });
}

export async function syncPushCommand(options: { store?: string }): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    printPush(await ctx.engine.push(ctx.storeId));
  });
}

export async function syncPullCommand(options: { store?: string; since?: string }): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    printPull(await ctx.engine.pull(ctx.storeId, { since: options.since }));
  });
}

export async function syncAllCommand(options: { store?: string }): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    const { push, pull } = await ctx.engine.sync(ctx.storeId);
    printPush(push);
    printPull(pull);
  });
}
