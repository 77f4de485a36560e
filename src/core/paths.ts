import { existsSync, readdirSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { decodeStorePath, encodeStorePath, isValidStoreId } from "./store-id.js";

export const STORE_DB_FILENAME = "lore.db";

/**
 * Root directory for all stores.
 * LORESYNC_HOME overrides the per-user default (~/.loresync).
 */
export function defaultStoreRoot(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LORESYNC_HOME?.trim();
  if (override) return join(override, "stores");

  const home = homedir();
  if (!home) return join(process.cwd(), ".loresync", "stores");
  return join(home, ".loresync", "stores");
}

export function storeDir(storeId: string, root: string = defaultStoreRoot()): string {
  return join(root, encodeStorePath(storeId));
}

/** storeDbPath("org/team") -> <root>/org__team/lore.db */
export function storeDbPath(storeId: string, root: string = defaultStoreRoot()): string {
  return join(storeDir(storeId, root), STORE_DB_FILENAME);
}

/** Store ids that have a database file under `root`, sorted. */
export function listLocalStores(root: string = defaultStoreRoot()): string[] {
  if (!existsSync(root)) return [];

  const ids: string[] = [];
  for (const entry of readdirSync(root, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const id = decodeStorePath(entry.name);
    if (!isValidStoreId(id)) continue;
    if (!existsSync(join(root, entry.name, STORE_DB_FILENAME))) continue;
    ids.push(id);
  }
  return ids.sort();
}
