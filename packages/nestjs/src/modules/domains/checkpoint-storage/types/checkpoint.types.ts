import type {
  Checkpoint,
  CheckpointMetadata as GraphCheckpointMetadata,
} from "@langchain/langgraph-checkpoint";

export type { Checkpoint };

export type ChannelVersion = number | string;

/**
 * Metadata stored beside a checkpoint. The graph runtime's fields are all
 * optional since older documents lack some of them; any other field is kept.
 */
export type CheckpointMetadata = Partial<GraphCheckpointMetadata> & {
  [key: string]: unknown;
};

/**
 * Addresses a thread, or one checkpoint within it when `checkpoint_id` is set.
 */
export interface CheckpointLocator {
  thread_id: string;
  checkpoint_id?: string;
}

/**
 * Exclusive upper bound for list and search.
 */
export interface CheckpointBound {
  thread_id?: string;
  checkpoint_id: string;
}

export interface CheckpointTuple {
  config: Required<CheckpointLocator>;
  checkpoint: Checkpoint;
  metadata: CheckpointMetadata;
  parentConfig?: Required<CheckpointLocator>;
}

export interface CheckpointListOptions {
  before?: CheckpointBound;
  /** Absent, zero or negative means unbounded */
  limit?: number;
}

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Exact-match filter over metadata fields, keyed by dot-separated paths.
 */
export type MetadataFilter = Record<string, JsonValue>;
