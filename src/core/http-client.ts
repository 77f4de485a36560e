import { Readable } from "stream";
import type { z } from "zod";
import { NotFoundError, RemoteError, ReservedStoreIdError, toErrorMessage, ValidationError } from "./errors.js";
import { logDebug } from "./log.js";
import { encodeStoreIdForUrl, isReservedStoreId, validateStoreId, validateStoreIdForCreation } from "./store-id.js";
import {
  deltaSchema,
  healthSchema,
  pushResultSchema,
  storeInfoSchema,
  storeListSchema,
  storeSummarySchema,
  toWirePushBatch,
  type DeltaResult,
  type HealthStatus,
  type PushBatch,
  type PushResult,
  type RemoteSyncClient,
  type StoreInfo,
  type StoreSummary,
} from "./remote.js";
import { DEFAULT_TIMEOUT_MS } from "./config.js";
import { VERSION } from "../version.js";

export const MAX_ERROR_BODY = 200;
export const SOURCE_ID_HEADER = "X-Loresync-Source-ID";

export interface HttpSyncClientOptions {
  baseUrl: string;
  apiKey: string;
  sourceId?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

interface RequestOptions {
  signal?: AbortSignal;
  query?: Record<string, string>;
  body?: unknown;
}

export function truncateBody(body: string, max: number = MAX_ERROR_BODY): string {
  return body.length > max ? `${body.slice(0, max)}...` : body;
}

/**
 * RemoteSyncClient over HTTP/JSON.
 *
 * Every call is bounded by the client timeout combined with the caller's
 * signal. Non-2xx responses become RemoteError with the status and a short
 * excerpt of the body.
 */
export class HttpSyncClient implements RemoteSyncClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly sourceId: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpSyncClientOptions) {
    if (!options.baseUrl.trim()) throw new ValidationError("baseUrl", "is required");
    if (!options.apiKey.trim()) throw new ValidationError("apiKey", "is required");

    this.baseUrl = options.baseUrl.trim().replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.sourceId = options.sourceId?.trim() ?? "";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async healthCheck(signal?: AbortSignal): Promise<HealthStatus> {
    const res = await this.request("health_check", "GET", "/api/v1/health", { signal });
    return this.parse("health_check", res, healthSchema);
  }

  async snapshot(storeId: string, signal?: AbortSignal): Promise<Readable> {
    validateStoreId(storeId);
    const res = await this.request("snapshot", "GET", `${storePath(storeId)}/sync/snapshot`, { signal });
    if (!res.body) {
      throw new RemoteError("snapshot", "response has no body");
    }
    return Readable.fromWeb(res.body);
  }

  async push(storeId: string, batch: PushBatch, signal?: AbortSignal): Promise<PushResult> {
    validateStoreId(storeId);
    const res = await this.request("push", "POST", `${storePath(storeId)}/sync/push`, {
      signal,
      body: toWirePushBatch(batch),
    });
    return this.parse("push", res, pushResultSchema);
  }

  async delta(storeId: string, after: string, limit: number, signal?: AbortSignal): Promise<DeltaResult> {
    validateStoreId(storeId);
    const res = await this.request("delta", "GET", `${storePath(storeId)}/sync/delta`, {
      signal,
      query: { after, limit: String(limit) },
    });
    return this.parse("delta", res, deltaSchema);
  }

  async listStores(prefix?: string, signal?: AbortSignal): Promise<StoreSummary[]> {
    const res = await this.request("list_stores", "GET", "/api/v1/stores", { signal });
    const { stores } = await this.parse("list_stores", res, storeListSchema);
    return prefix ? stores.filter((s) => s.id.startsWith(prefix)) : stores;
  }

  async createStore(storeId: string, description?: string, signal?: AbortSignal): Promise<StoreSummary> {
    validateStoreIdForCreation(storeId);
    const res = await this.request("create_store", "POST", "/api/v1/stores", {
      signal,
      body: description ? { id: storeId, description } : { id: storeId },
    });
    return this.parse("create_store", res, storeSummarySchema);
  }

  async deleteStore(storeId: string, signal?: AbortSignal): Promise<void> {
    validateStoreId(storeId);
    if (isReservedStoreId(storeId)) {
      throw new ReservedStoreIdError(storeId);
    }
    const res = await this.request("delete_store", "DELETE", storePath(storeId), {
      signal,
      query: { confirm: "true" },
    });
    await res.body?.cancel();
  }

  async storeInfo(storeId: string, signal?: AbortSignal): Promise<StoreInfo> {
    validateStoreId(storeId);
    try {
      const res = await this.request("store_info", "GET", storePath(storeId), { signal });
      return await this.parse("store_info", res, storeInfoSchema);
    } catch (err) {
      if (err instanceof RemoteError && err.statusCode === 404) {
        throw new NotFoundError("store", storeId);
      }
      throw err;
    }
  }

  // ── Transport ─────────────────────────────────────────

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      "User-Agent": `loresync/${VERSION}`,
      Accept: "application/json",
    };
    if (hasBody) headers["Content-Type"] = "application/json";
    if (this.sourceId) headers[SOURCE_ID_HEADER] = this.sourceId;
    return headers;
  }

  private async request(
    operation: string,
    method: string,
    path: string,
    options: RequestOptions
  ): Promise<Response> {
    const query = options.query ? `?${new URLSearchParams(options.query).toString()}` : "";
    const url = `${this.baseUrl}${path}${query}`;
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    const started = Date.now();

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: this.headers(options.body !== undefined),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal,
      });
    } catch (err) {
      logDebug(`${method} ${path} failed after ${Date.now() - started}ms: ${toErrorMessage(err)}`);
      const reason = timeout.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : options.signal?.aborted
          ? "aborted"
          : toErrorMessage(err);
      throw new RemoteError(operation, this.scrub(reason), undefined, { cause: err });
    }

    logDebug(`${method} ${path} -> ${res.status} (${Date.now() - started}ms)`);

    if (!res.ok) {
      let body: string;
      try {
        body = (await res.text()).trim();
      } catch (err) {
        body = `unreadable response body: ${toErrorMessage(err)}`;
      }
      throw new RemoteError(operation, this.scrub(truncateBody(body || res.statusText)), res.status);
    }
    return res;
  }

  private async parse<S extends z.ZodTypeAny>(operation: string, res: Response, schema: S): Promise<z.output<S>> {
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new RemoteError(operation, `invalid JSON response: ${toErrorMessage(err)}`, undefined, { cause: err });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      throw new RemoteError(operation, `unexpected response: ${where}${issue.message}`);
    }
    return parsed.data;
  }

  private scrub(message: string): string {
    return message.split(this.apiKey).join("[redacted]");
  }
}

function storePath(storeId: string): string {
  return `/api/v1/stores/${encodeStoreIdForUrl(storeId)}`;
}
