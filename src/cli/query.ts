import { formatLore, parseCategoryOption, parseList, parseNumberOption, runWithContext } from "./util.js";

export interface QueryCommandOptions {
  text?: string;
  k?: string;
  minConfidence?: string;
  categories?: string;
  store?: string;
  json?: boolean;
}

export async function queryCommand(options: QueryCommandOptions): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    const store = ctx.registry.open(ctx.storeId);
    const results = await store.query({
      text: options.text,
      k: parseNumberOption("k", options.k),
      minConfidence: parseNumberOption("min-confidence", options.minConfidence),
      categories: parseList(options.categories).map(parseCategoryOption),
    });

    if (options.json) {
      console.log(JSON.stringify(results.map(({ embedding: _embedding, ...rest }) => rest), null, 2));
      return;
    }

    if (results.length === 0) {
      console.log("No lore found.");
      return;
    }

    console.log(`${results.length} result(s) from ${ctx.storeId}:\n`);
    for (const lore of results) {
      console.log(formatLore(lore));
      console.log();
    }
  });
}
