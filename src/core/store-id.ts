import { InvalidStoreIdError, ReservedStoreIdError } from "./errors.js";

export const DEFAULT_STORE_ID = "default";
export const MAX_STORE_ID_LENGTH = 256;

/**
 * <segment>[/<segment>]{0,3}
 * Segments: 1-64 chars of [a-z0-9-], no leading/trailing hyphen.
 * Consecutive hyphens are rejected separately.
 */
const STORE_ID_PATTERN =
  /^[a-z0-9](?:[a-z0-9-]{0,62}[a-z0-9])?(?:\/[a-z0-9](?:[a-z0-9-]{0,62}[a-z0-9])?){0,3}$/;

const RESERVED_STORE_IDS: ReadonlySet<string> = new Set([DEFAULT_STORE_ID, "_system"]);

// "_" never appears in a valid segment, so "__" cannot collide with real content.
const PATH_SEPARATOR_TOKEN = "__";

export function isReservedStoreId(id: string): boolean {
  return RESERVED_STORE_IDS.has(id);
}

/** True when the id may be targeted (reserved ids included). */
export function isValidStoreId(id: string): boolean {
  if (id.length === 0 || id.length > MAX_STORE_ID_LENGTH) return false;
  if (isReservedStoreId(id)) return true;
  if (id.includes("--")) return false;
  return STORE_ID_PATTERN.test(id);
}

export function validateStoreId(id: string): void {
  if (!isValidStoreId(id)) {
    throw new InvalidStoreIdError(id);
  }
}

export function validateStoreIdForCreation(id: string): void {
  validateStoreId(id);
  if (isReservedStoreId(id)) {
    throw new ReservedStoreIdError(id);
  }
}

export function encodeStorePath(id: string): string {
  return id.split("/").join(PATH_SEPARATOR_TOKEN);
}

export function decodeStorePath(token: string): string {
  return token.split(PATH_SEPARATOR_TOKEN).join("/");
}

/** Single URL path segment: "org/team" -> "org%2Fteam". */
export function encodeStoreIdForUrl(id: string): string {
  return encodeURIComponent(id);
}

/**
 * Pick the store to operate on: explicit argument, then the environment
 * override, then the fallback. The result is validated before it is returned.
 */
export function resolveStoreId(
  explicit?: string,
  envOverride: string | undefined = process.env.LORESYNC_STORE,
  fallback: string = DEFAULT_STORE_ID
): string {
  const candidates: Array<[string | undefined, string]> = [
    [explicit, "argument"],
    [envOverride, "LORESYNC_STORE"],
    [fallback, "fallback"],
  ];

  for (const [value, source] of candidates) {
    const trimmed = value?.trim();
    if (!trimmed) continue;
    if (!isValidStoreId(trimmed)) {
      throw new InvalidStoreIdError(trimmed, source);
    }
    return trimmed;
  }

  return DEFAULT_STORE_ID;
}
