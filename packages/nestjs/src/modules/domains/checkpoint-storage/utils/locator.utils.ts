import { InvalidArgumentError } from "../errors/checkpoint.errors";
import type {
  Checkpoint,
  CheckpointBound,
  CheckpointLocator,
} from "../types/checkpoint.types";

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.length > 0;

export function getThreadId(locator: CheckpointLocator | undefined): string {
  const threadId: unknown = locator?.thread_id;
  if (!isNonEmptyString(threadId)) {
    throw new InvalidArgumentError(
      `The passed locator is missing a required "thread_id" field.`,
    );
  }
  return threadId;
}

export function getCheckpointId(
  locator: CheckpointLocator | undefined,
): string | undefined {
  const checkpointId: unknown = locator?.checkpoint_id;
  if (checkpointId === undefined || checkpointId === null || checkpointId === "") {
    return undefined;
  }
  if (typeof checkpointId !== "string") {
    throw new InvalidArgumentError(`"checkpoint_id" must be a string.`);
  }
  return checkpointId;
}

export function getBoundCheckpointId(
  before: CheckpointBound | undefined,
): string | undefined {
  if (before === undefined) {
    return undefined;
  }
  const checkpointId: unknown = before.checkpoint_id;
  if (!isNonEmptyString(checkpointId)) {
    throw new InvalidArgumentError(
      `The "before" bound is missing a required "checkpoint_id" field.`,
    );
  }
  return checkpointId;
}

export function getNewCheckpointId(checkpoint: Checkpoint): string {
  const id: unknown = checkpoint?.id;
  if (!isNonEmptyString(id)) {
    throw new InvalidArgumentError(
      `Failed to put checkpoint. The checkpoint is missing a required "id" field.`,
    );
  }
  return id;
}

/**
 * Non-positive or absent limits mean "no limit".
 */
export function normalizeLimit(limit: number | undefined): number | undefined {
  if (limit === undefined || limit === null) {
    return undefined;
  }
  if (typeof limit !== "number" || !Number.isInteger(limit)) {
    throw new InvalidArgumentError(`"limit" must be an integer, got ${limit}.`);
  }
  return limit > 0 ? limit : undefined;
}
