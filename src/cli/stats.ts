import { runWithContext } from "./util.js";

export async function statsCommand(options: { store?: string; detailed?: boolean }): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    const store = ctx.registry.open(ctx.storeId);
    const stats = await store.stats();

    console.log(`Store: ${ctx.storeId}\n`);
    console.log(`  Lore:             ${stats.lore_count}`);
    console.log(`  Pending sync:     ${stats.pending_sync}`);
    console.log(`  Pending feedback: ${stats.pending_feedback}`);
    console.log(`  Last sync:        ${stats.last_sync || "never"}`);
    console.log(`  Schema version:   ${stats.schema_version}`);
    console.log(`  Remote:           ${ctx.client ? ctx.config.remote?.url : "offline"}`);

    if (!options.detailed) return;

    const detail = await store.detailedStats();
    console.log(`\n  Average confidence: ${detail.average_confidence.toFixed(2)}`);
    console.log(`  Last updated:       ${detail.last_updated ?? "never"}`);
    for (const [category, n] of Object.entries(detail.category_distribution)) {
      console.log(`    ${category.padEnd(24)} ${n}`);
    }
  });
}
