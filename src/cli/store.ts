import { validateStoreIdForCreation } from "../core/store-id.js";
import { prompt, requireRemote, runWithContext } from "./util.js";

export async function storeListCommand(options: { prefix?: string }): Promise<void> {
  await runWithContext(undefined, async (ctx) => {
    const stores = await requireRemote(ctx).listStores(options.prefix);
    if (stores.length === 0) {
      console.log("No remote stores.");
      return;
    }
    for (const s of stores) {
      const description = s.description ? `  ${s.description}` : "";
      console.log(`  ${s.id.padEnd(32)} ${String(s.recordCount).padStart(6)} record(s)${description}`);
    }
  });
}

export async function storeCreateCommand(storeId: string, options: { description?: string }): Promise<void> {
  await runWithContext(undefined, async (ctx) => {
    validateStoreIdForCreation(storeId);
    const created = await requireRemote(ctx).createStore(storeId, options.description);

    const local = ctx.registry.open(created.id);
    if (options.description) {
      await local.setDescription(options.description);
    }
    console.log(`Created store ${created.id}`);
  });
}

export async function storeDeleteCommand(storeId: string, options: { yes?: boolean }): Promise<void> {
  await runWithContext(undefined, async (ctx) => {
    const client = requireRemote(ctx);
    if (!options.yes) {
      const answer = await prompt(`Delete remote store "${storeId}"? Type the store id to confirm: `);
      if (answer !== storeId) {
        console.log("Aborted.");
        return;
      }
    }
    await client.deleteStore(storeId);
    console.log(`Deleted remote store ${storeId}. The local copy was left in place.`);
  });
}

export async function storeInfoCommand(storeId: string | undefined): Promise<void> {
  await runWithContext(storeId, async (ctx) => {
    const info = await requireRemote(ctx).storeInfo(ctx.storeId);
    const { stats } = info;

    console.log(`Store: ${info.id}`);
    if (info.description) console.log(`  ${info.description}`);
    console.log(`\n  Created:        ${info.created || "unknown"}`);
    console.log(`  Last accessed:  ${info.lastAccessed || "unknown"}`);
    console.log(`  Lore:           ${stats.activeLore} active, ${stats.deletedLore} deleted`);
    console.log(
      `  Embeddings:     ${stats.embeddings.complete} complete, ${stats.embeddings.pending} pending, ` +
        `${stats.embeddings.failed} failed`
    );
    console.log(`  Avg confidence: ${stats.averageConfidence.toFixed(2)}`);
    console.log(`  Sources:        ${stats.uniqueSourceCount}`);
  });
}

export async function storeLocalCommand(): Promise<void> {
  await runWithContext(undefined, async (ctx) => {
    const ids = ctx.registry.listLocal();
    if (ids.length === 0) {
      console.log(`No local stores under ${ctx.registry.root}.`);
      return;
    }
    for (const id of ids) {
      const stats = await ctx.registry.open(id).stats();
      console.log(
        `  ${id.padEnd(32)} ${String(stats.lore_count).padStart(6)} lore, ` +
          `${stats.pending_sync} pending, last sync ${stats.last_sync || "never"}`
      );
    }
  });
}
