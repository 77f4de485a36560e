import { createInterface } from "readline";
import { loadConfig, type LoreSyncConfig } from "../core/config.js";
import { describeError, OfflineError, ValidationError } from "../core/errors.js";
import { HttpSyncClient } from "../core/http-client.js";
import { setDebug } from "../core/log.js";
import { StoreRegistry } from "../core/registry.js";
import { resolveStoreId } from "../core/store-id.js";
import { SyncEngine } from "../core/sync.js";
import { isCategory, type Category, type Lore } from "../types.js";
import type { RemoteSyncClient } from "../core/remote.js";

export interface CliContext {
  config: LoreSyncConfig;
  storeId: string;
  registry: StoreRegistry;
  client: RemoteSyncClient | null;
  engine: SyncEngine;
}

export function prompt(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function createRemoteClient(config: LoreSyncConfig): RemoteSyncClient | null {
  if (!config.remote) return null;
  return new HttpSyncClient({
    baseUrl: config.remote.url,
    apiKey: config.remote.apiKey,
    sourceId: config.sourceId,
    timeoutMs: config.timeoutMs,
  });
}

export function createContext(store?: string, env: NodeJS.ProcessEnv = process.env): CliContext {
  const config = loadConfig(env);
  setDebug(config.debug);

  const storeId = resolveStoreId(store, config.store);
  const registry = new StoreRegistry(config.storeRoot);
  const client = createRemoteClient(config);
  const engine = new SyncEngine({
    openStore: (id) => registry.open(id),
    client,
    batchSize: config.pushBatch,
    deltaLimit: config.deltaLimit,
  });
  return { config, storeId, registry, client, engine };
}

export function requireRemote(ctx: CliContext): RemoteSyncClient {
  if (!ctx.client) throw new OfflineError();
  return ctx.client;
}

/**
 * Run a command body with a fresh context. Errors are printed once and set
 * a non-zero exit code; open stores are closed either way.
 */
export async function runWithContext(
  store: string | undefined,
  fn: (ctx: CliContext) => Promise<void>
): Promise<void> {
  let ctx: CliContext | undefined;
  try {
    ctx = createContext(store);
    await fn(ctx);
  } catch (err) {
    console.error(describeError(err));
    process.exitCode = 1;
  } finally {
    await ctx?.registry.closeAll();
  }
}

export function parseList(value?: string): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parseCategoryOption(value: string): Category {
  const normalized = value.trim().toUpperCase();
  if (!isCategory(normalized)) {
    throw new ValidationError("category", `unknown category "${value}"`);
  }
  return normalized;
}

export function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new ValidationError(name, `not a number: "${value}"`);
  }
  return n;
}

export function formatLore(lore: Lore, ref?: string): string {
  const head = ref ? `[${ref}] ${lore.id}` : lore.id;
  const lines = [
    `  ${head}`,
    `    Category:   ${lore.category}`,
    `    Confidence: ${lore.confidence.toFixed(2)} (validated ${lore.validation_count}x)`,
    `    Content:    ${lore.content}`,
  ];
  if (lore.context) lines.push(`    Context:    ${lore.context}`);
  if (lore.sources.length > 0) lines.push(`    Sources:    ${lore.sources.join(", ")}`);
  if (lore.sync_error) lines.push(`    Sync error: ${lore.sync_error}`);
  return lines.join("\n");
}
