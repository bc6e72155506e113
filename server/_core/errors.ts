/**
 * Error taxonomy of the warehouse.
 *
 * Record-level errors are recovered by the sync worker (skip, count, continue).
 * Everything else is fatal for the invocation and propagates to the command.
 */

export type WarehouseErrorCode =
  | "MALFORMED_RECORD"
  | "DIMENSION_CONFLICT"
  | "STORAGE_UNAVAILABLE"
  | "TRANSFORM_INCONSISTENCY"
  | "SOURCE_UNAVAILABLE";

export class WarehouseError extends Error {
  readonly code: WarehouseErrorCode;

  constructor(code: WarehouseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A raw game lacks a required field (source-native id, result code, players)
 * or carries one that cannot be interpreted.
 */
export class MalformedRecordError extends WarehouseError {
  readonly issues: string[];

  constructor(issues: string[], readonly recordRef: string | null = null) {
    super("MALFORMED_RECORD", `Malformed record${recordRef ? ` ${recordRef}` : ""}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export interface DuplicateNaturalKey {
  table: string;
  naturalKey: string;
  rows: number;
}

/** Two or more dimension rows share a natural key. Needs manual reconciliation. */
export class DimensionConflictError extends WarehouseError {
  constructor(readonly duplicates: DuplicateNaturalKey[]) {
    super(
      "DIMENSION_CONFLICT",
      `Dimension conflict: ${duplicates.map((d) => `${d.table}[${d.naturalKey}] has ${d.rows} rows`).join(", ")}`
    );
  }
}

export class StorageUnavailableError extends WarehouseError {
  constructor(readonly location: string, reason: string, options?: { cause?: unknown }) {
    super("STORAGE_UNAVAILABLE", `Warehouse at ${location} is unavailable: ${reason}`, options);
  }
}

export class TransformInconsistencyError extends WarehouseError {
  constructor(readonly model: string, reason: string) {
    super("TRANSFORM_INCONSISTENCY", `Watermark of ${model} is inconsistent: ${reason}`);
  }
}

/** A platform API could not be reached or answered with an error status. */
export class SourceUnavailableError extends WarehouseError {
  constructor(readonly platform: string, reason: string, options?: { cause?: unknown }) {
    super("SOURCE_UNAVAILABLE", `${platform} is unavailable: ${reason}`, options);
  }
}

export function isRecordLevelError(error: unknown): error is MalformedRecordError {
  return error instanceof MalformedRecordError;
}

// Node's AbortError and axios' CanceledError
const CANCELLATION_NAMES = new Set(["AbortError", "CanceledError"]);

/** Whether the error, or one it wraps, reports a request cancelled by an abort signal. */
export function isCancellation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; current instanceof Error && depth < 5; depth++) {
    if (CANCELLATION_NAMES.has(current.name)) return true;
    current = current.cause;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
