/**
 * Error taxonomy shared by the store, the remote client and the sync engine.
 *
 * Every error carries a stable `code` so the CLI and the MCP server can
 * branch on it without string matching.
 */

export const ErrorCodes = {
  OFFLINE: "LORESYNC_OFFLINE",
  MODEL_MISMATCH: "LORESYNC_MODEL_MISMATCH",
  INVALID_STORE_ID: "LORESYNC_INVALID_STORE_ID",
  RESERVED_STORE_ID: "LORESYNC_RESERVED_STORE_ID",
  REMOTE: "LORESYNC_REMOTE",
  LOCAL_IO: "LORESYNC_LOCAL_IO",
  NOT_FOUND: "LORESYNC_NOT_FOUND",
  VALIDATION: "LORESYNC_VALIDATION",
  SYNC_PHASE: "LORESYNC_SYNC_PHASE",
  SYNC_BUSY: "LORESYNC_SYNC_BUSY",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class LoreSyncError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoreSyncError";
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/** No remote service is configured. An expected state, not a defect. */
export class OfflineError extends LoreSyncError {
  constructor() {
    super(
      ErrorCodes.OFFLINE,
      "No remote configured: set LORESYNC_REMOTE_URL and LORESYNC_API_KEY to enable sync."
    );
    this.name = "OfflineError";
  }
}

export class ModelMismatchError extends LoreSyncError {
  readonly local: string;
  readonly remote: string;

  constructor(local: string, remote: string) {
    super(
      ErrorCodes.MODEL_MISMATCH,
      `Embedding model mismatch: local store uses "${local}", remote uses "${remote}". ` +
        "Local lore was left untouched; reinitialize the store to adopt the remote model."
    );
    this.name = "ModelMismatchError";
    this.local = local;
    this.remote = remote;
  }
}

export class InvalidStoreIdError extends LoreSyncError {
  readonly storeId: string;

  constructor(storeId: string, source?: string) {
    super(
      ErrorCodes.INVALID_STORE_ID,
      `Invalid store ID${source ? ` from ${source}` : ""}: "${storeId}". ` +
        "Use 1-4 '/'-separated segments of lowercase letters, digits and single hyphens."
    );
    this.name = "InvalidStoreIdError";
    this.storeId = storeId;
  }
}

export class ReservedStoreIdError extends LoreSyncError {
  readonly storeId: string;

  constructor(storeId: string) {
    super(ErrorCodes.RESERVED_STORE_ID, `Store ID "${storeId}" is reserved and cannot be created or deleted.`);
    this.name = "ReservedStoreIdError";
    this.storeId = storeId;
  }
}

export class RemoteError extends LoreSyncError {
  readonly operation: string;
  readonly statusCode?: number;

  constructor(operation: string, message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(
      ErrorCodes.REMOTE,
      statusCode === undefined
        ? `remote ${operation} failed: ${message}`
        : `remote ${operation} failed (HTTP ${statusCode}): ${message}`,
      options
    );
    this.name = "RemoteError";
    this.operation = operation;
    this.statusCode = statusCode;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation, statusCode: this.statusCode };
  }
}

export class LocalIOError extends LoreSyncError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(ErrorCodes.LOCAL_IO, `local store ${operation} failed: ${toErrorMessage(cause)}`, { cause });
    this.name = "LocalIOError";
    this.operation = operation;
  }
}

export class NotFoundError extends LoreSyncError {
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string) {
    super(ErrorCodes.NOT_FOUND, `${resource} not found: ${id}`);
    this.name = "NotFoundError";
    this.resource = resource;
    this.id = id;
  }
}

export class ValidationError extends LoreSyncError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(ErrorCodes.VALIDATION, `${field}: ${message}`);
    this.name = "ValidationError";
    this.field = field;
  }
}

export type SyncOperation = "bootstrap" | "push" | "pull";

/**
 * Wraps a failure inside a sync run with the phase it happened in.
 * `mutated` tells whether local state had already been changed.
 */
export class SyncPhaseError extends LoreSyncError {
  readonly operation: SyncOperation;
  readonly phase: string;
  readonly mutated: boolean;

  constructor(operation: SyncOperation, phase: string, mutated: boolean, cause: unknown) {
    super(
      ErrorCodes.SYNC_PHASE,
      `${operation}: ${phase}: ${toErrorMessage(cause)}${mutated ? " (local store already modified)" : ""}`,
      { cause }
    );
    this.name = "SyncPhaseError";
    this.operation = operation;
    this.phase = phase;
    this.mutated = mutated;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation, phase: this.phase, mutated: this.mutated };
  }
}

export class SyncBusyError extends LoreSyncError {
  constructor(storeId: string, running: string) {
    super(ErrorCodes.SYNC_BUSY, `store "${storeId}" is already ${running}`);
    this.name = "SyncBusyError";
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * User-facing text for an error. Offline and model-mismatch states are
 * configuration states, so they get their own guidance instead of a
 * generic failure line.
 */
export function describeError(err: unknown): string {
  if (err instanceof OfflineError) {
    return `Offline: ${err.message}`;
  }
  if (err instanceof ModelMismatchError) {
    return err.message;
  }
  if (err instanceof SyncPhaseError && err.cause instanceof LoreSyncError) {
    return `${err.operation} failed during ${err.phase}: ${err.cause.message}`;
  }
  return toErrorMessage(err);
}
