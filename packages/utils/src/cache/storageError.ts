export type StorageOperation = "read" | "write" | "list" | "remove" | "clear";

/**
 * Raised when the cache's storage medium fails (disk full, permission
 * denied, unreadable record). A missing key is not a StorageError.
 */
export class StorageError extends Error {
  readonly operation: StorageOperation;
  readonly key?: string;
  /** errno code of the underlying failure, e.g. ENOSPC or EACCES */
  readonly code?: string;

  constructor(
    operation: StorageOperation,
    message: string,
    options: { key?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "StorageError";
    this.operation = operation;
    this.key = options.key;
    this.code = errnoCode(options.cause);
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}
