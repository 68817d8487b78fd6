export type CheckpointErrorCode =
  | "INVALID_ARGUMENT"
  | "DECODE_ERROR"
  | "STORAGE_ERROR";

/**
 * Base class for every error raised by a checkpointer.
 * The `code` is stable across releases, messages are not.
 */
export abstract class CheckpointError extends Error {
  abstract readonly code: CheckpointErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Caller contract violation: malformed locator, bound, limit or filter.
 */
export class InvalidArgumentError extends CheckpointError {
  readonly code = "INVALID_ARGUMENT";
}

/**
 * A stored payload could not be turned back into a value.
 */
export class DecodeError extends CheckpointError {
  readonly code = "DECODE_ERROR";
}

/**
 * The storage engine failed. Never retried by the store.
 */
export class StorageError extends CheckpointError {
  readonly code = "STORAGE_ERROR";
}

export const isCheckpointError = (error: unknown): error is CheckpointError =>
  error instanceof CheckpointError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
