/**
 * Raised by a persistence gateway when the underlying store could not
 * complete an operation. The original driver error is kept as `cause`.
 */
export class StorageError extends Error {
  readonly code = "STORAGE_FAILURE";

  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`Storage operation failed: ${operation}`, { cause });
    this.name = "StorageError";
  }
}

export function isStorageError(err: unknown): err is StorageError {
  return err instanceof StorageError;
}

// body-parser attaches `type` and `status` to the errors it raises
export type BodyParserError = Error & { type: string; status: number };

export function isBodyParserError(err: unknown): err is BodyParserError {
  if (!(err instanceof Error)) return false;
  return (
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}
