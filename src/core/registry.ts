import { LoreStore, type LoreStoreOptions } from "./store.js";
import { storeDbPath, listLocalStores } from "./paths.js";
import { validateStoreId } from "./store-id.js";

/**
 * One open LoreStore per store id for the life of the process. The database
 * file must not be opened twice, so every caller goes through here.
 */
export class StoreRegistry {
  readonly root: string;
  private readonly stores = new Map<string, LoreStore>();
  private readonly clock?: LoreStoreOptions["clock"];

  constructor(root: string, options: Pick<LoreStoreOptions, "clock"> = {}) {
    this.root = root;
    this.clock = options.clock;
  }

  open(storeId: string): LoreStore {
    validateStoreId(storeId);
    const existing = this.stores.get(storeId);
    if (existing && !existing.isClosed) return existing;

    const store = LoreStore.open(storeDbPath(storeId, this.root), { storeId, clock: this.clock });
    this.stores.set(storeId, store);
    return store;
  }

  isOpen(storeId: string): boolean {
    const store = this.stores.get(storeId);
    return Boolean(store && !store.isClosed);
  }

  openIds(): string[] {
    return [...this.stores.entries()].filter(([, s]) => !s.isClosed).map(([id]) => id);
  }

  /** Store ids with a database under the root, whether or not they are open. */
  listLocal(): string[] {
    return listLocalStores(this.root);
  }

  async close(storeId: string): Promise<void> {
    const store = this.stores.get(storeId);
    if (!store) return;
    this.stores.delete(storeId);
    await store.close();
  }

  async closeAll(): Promise<void> {
    const stores = [...this.stores.values()];
    this.stores.clear();
    await Promise.all(stores.map((s) => s.close()));
  }
}
