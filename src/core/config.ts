import { hostname } from "os";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { defaultStoreRoot } from "./paths.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_PUSH_BATCH = 100;
export const DEFAULT_DELTA_LIMIT = 500;
export const DEFAULT_SYNC_INTERVAL_MS = 5 * 60_000;

export interface RemoteConfig {
  url: string;
  apiKey: string;
}

export interface LoreSyncConfig {
  storeRoot: string;
  /** LORESYNC_STORE, unvalidated; resolveStoreId() checks it. */
  store: string | undefined;
  /** null means offline. */
  remote: RemoteConfig | null;
  sourceId: string;
  timeoutMs: number;
  pushBatch: number;
  deltaLimit: number;
  /** 0 disables the background push. */
  syncIntervalMs: number;
  debug: boolean;
}

const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const text = z.preprocess(blankAsUnset, z.string().trim().optional());

const integer = (fallback: number, min: number) =>
  z.preprocess(
    blankAsUnset,
    z
      .string()
      .trim()
      .regex(/^\d+$/, "must be a whole number")
      .transform(Number)
      .pipe(z.number().int().min(min, `must be at least ${min}`))
      .optional()
      .transform((v) => v ?? fallback)
  );

const envSchema = z
  .object({
    LORESYNC_HOME: text,
    LORESYNC_STORE: text,
    LORESYNC_REMOTE_URL: z.preprocess(
      blankAsUnset,
      z
        .string()
        .trim()
        .url("must be an absolute URL")
        .refine((u) => /^https?:\/\//i.test(u), "must use http or https")
        .transform((u) => u.replace(/\/+$/, ""))
        .optional()
    ),
    LORESYNC_API_KEY: text,
    LORESYNC_SOURCE_ID: text,
    LORESYNC_TIMEOUT_MS: integer(DEFAULT_TIMEOUT_MS, 1),
    LORESYNC_PUSH_BATCH: integer(DEFAULT_PUSH_BATCH, 1),
    LORESYNC_DELTA_LIMIT: integer(DEFAULT_DELTA_LIMIT, 1),
    LORESYNC_SYNC_INTERVAL_MS: integer(DEFAULT_SYNC_INTERVAL_MS, 0),
    LORESYNC_DEBUG: text,
  })
  .superRefine((env, ctx) => {
    if (env.LORESYNC_REMOTE_URL && !env.LORESYNC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LORESYNC_API_KEY"],
        message: "required when LORESYNC_REMOTE_URL is set",
      });
    }
  });

/**
 * Read configuration from the environment.
 * The first invalid variable is reported as a ValidationError naming it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoreSyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(String(issue.path[0] ?? "environment"), issue.message);
  }

  const vars = parsed.data;
  const remote =
    vars.LORESYNC_REMOTE_URL && vars.LORESYNC_API_KEY
      ? { url: vars.LORESYNC_REMOTE_URL, apiKey: vars.LORESYNC_API_KEY }
      : null;
  const debugFlag = vars.LORESYNC_DEBUG?.toLowerCase();

  return {
    storeRoot: defaultStoreRoot(env),
    store: vars.LORESYNC_STORE,
    remote,
    sourceId: vars.LORESYNC_SOURCE_ID ?? hostname(),
    timeoutMs: vars.LORESYNC_TIMEOUT_MS,
    pushBatch: vars.LORESYNC_PUSH_BATCH,
    deltaLimit: vars.LORESYNC_DELTA_LIMIT,
    syncIntervalMs: vars.LORESYNC_SYNC_INTERVAL_MS,
    debug: debugFlag === "1" || debugFlag === "true",
  };
}
