import { parseCategoryOption, parseList, parseNumberOption, runWithContext } from "./util.js";

export interface RecordCommandOptions {
  content: string;
  category: string;
  context?: string;
  confidence?: string;
  sources?: string;
  store?: string;
}

export async function recordCommand(options: RecordCommandOptions): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    const store = ctx.registry.open(ctx.storeId);
    const lore = await store.record({
      content: options.content,
      category: parseCategoryOption(options.category),
      context: options.context,
      confidence: parseNumberOption("confidence", options.confidence),
      source_id: ctx.config.sourceId,
      sources: parseList(options.sources),
    });

    console.log(`Recorded ${lore.id} in ${ctx.storeId}`);
    console.log(`  ${lore.category} (confidence ${lore.confidence.toFixed(2)})`);
  });
}
