export interface SessionRef {
  ref: string;
  storeId: string;
  loreId: string;
}

const REF_PATTERN = /^L[1-9]\d*$/;

// NUL is valid in neither a store id nor a record id.
const KEY_SEPARATOR = "\u0000";

export function isSessionRef(value: string): boolean {
  return REF_PATTERN.test(value);
}

/** "L12" -> 12, or null when the value is not a session ref. */
export function parseSessionRef(value: string): number | null {
  return isSessionRef(value) ? Number(value.slice(1)) : null;
}

/**
 * Short references (L1, L2, ...) for records surfaced during one session,
 * across any number of stores.
 *
 * The counter is shared by all stores, so refs are strictly increasing for
 * the life of the tracker; re-tracking a (store, record) pair returns its
 * existing ref. Methods are synchronous, so a call completes before any
 * other caller on the event loop sees the tables.
 */
export class SessionTracker {
  private counter = 0;
  private byRef = new Map<string, SessionRef>();
  private byLore = new Map<string, string>();

  track(storeId: string, loreId: string): string {
    const key = storeId + KEY_SEPARATOR + loreId;
    const existing = this.byLore.get(key);
    if (existing) return existing;

    this.counter += 1;
    const ref = `L${this.counter}`;
    this.byRef.set(ref, { ref, storeId, loreId });
    this.byLore.set(key, ref);
    return ref;
  }

  resolve(ref: string): SessionRef | null {
    const entry = this.byRef.get(ref);
    return entry ? { ...entry } : null;
  }

  resolveByLore(storeId: string, loreId: string): string | null {
    return this.byLore.get(storeId + KEY_SEPARATOR + loreId) ?? null;
  }

  /** Copy of the ref table in allocation order. */
  all(): SessionRef[] {
    return [...this.byRef.values()].map((entry) => ({ ...entry }));
  }

  count(): number {
    return this.byRef.size;
  }

  /** Forget every ref and restart numbering at L1. */
  clear(): void {
    this.counter = 0;
    this.byRef = new Map();
    this.byLore = new Map();
  }
}
