import { emptyCheckpoint } from "@langchain/langgraph-checkpoint";

import { DecodeError } from "../errors/checkpoint.errors";
import type {
  ChannelVersion,
  Checkpoint,
  CheckpointMetadata,
} from "../types/checkpoint.types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Map) &&
  !(value instanceof Set) &&
  !(value instanceof Uint8Array);

const isVersionMap = (
  value: unknown,
): value is Record<string, ChannelVersion> =>
  isRecord(value) &&
  Object.values(value).every(
    (version) => typeof version === "number" || typeof version === "string",
  );

const isVersionsSeen = (
  value: unknown,
): value is Record<string, Record<string, ChannelVersion>> =>
  isRecord(value) && Object.values(value).every(isVersionMap);

function optionalField<T>(
  value: Record<string, unknown>,
  field: string,
  isValid: (entry: unknown) => entry is T,
  fallback: T,
): T {
  const entry = value[field];
  if (entry === undefined) {
    return fallback;
  }
  if (!isValid(entry)) {
    throw new DecodeError(`Checkpoint field "${field}" has an unexpected shape`);
  }
  return entry;
}

/**
 * Shapes a decoded payload into a checkpoint. Older payloads may predate some
 * fields: a missing id is taken from the row key and missing maps start empty.
 * A map that is present but malformed is a `DecodeError`.
 */
export function toCheckpoint(value: unknown, checkpointId: string): Checkpoint {
  if (!isRecord(value)) {
    throw new DecodeError("Checkpoint payload is not an object");
  }

  const base = emptyCheckpoint();
  return {
    ...base,
    ...value,
    v: typeof value.v === "number" ? value.v : base.v,
    id: typeof value.id === "string" && value.id !== "" ? value.id : checkpointId,
    ts: typeof value.ts === "string" ? value.ts : "",
    channel_values: optionalField(value, "channel_values", isRecord, {}),
    channel_versions: optionalField(
      value,
      "channel_versions",
      isVersionMap,
      {},
    ),
    versions_seen: optionalField(value, "versions_seen", isVersionsSeen, {}),
  };
}

export function toMetadata(value: unknown): CheckpointMetadata {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new DecodeError("Metadata payload is not an object");
  }

  const metadata: CheckpointMetadata = {};
  for (const [key, entry] of Object.entries(value)) {
    Object.defineProperty(metadata, key, {
      value: entry,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return metadata;
}
