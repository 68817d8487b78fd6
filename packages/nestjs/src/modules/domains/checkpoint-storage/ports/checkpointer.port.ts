import { Inject } from "@nestjs/common";

import type {
  Checkpoint,
  CheckpointListOptions,
  CheckpointLocator,
  CheckpointMetadata,
  CheckpointTuple,
  MetadataFilter,
} from "../types/checkpoint.types";

export const CHECKPOINTER = Symbol("checkpointer");

/**
 * Operations every checkpoint backend provides.
 */
export interface CheckpointerPort {
  /** Creates the backing storage if needed. Safe to call repeatedly. */
  setup(): Promise<void>;

  /**
   * The checkpoint named by `locator.checkpoint_id`, or the thread's latest
   * when no id is given.
   */
  getTuple(locator: CheckpointLocator): Promise<CheckpointTuple | undefined>;

  get(locator: CheckpointLocator): Promise<Checkpoint | undefined>;

  /** One thread's checkpoints, newest first. */
  list(
    locator: CheckpointLocator,
    options?: CheckpointListOptions,
  ): AsyncGenerator<CheckpointTuple>;

  /** Checkpoints of every thread whose metadata matches `filter`, newest first. */
  search(
    filter: MetadataFilter,
    options?: CheckpointListOptions,
  ): AsyncGenerator<CheckpointTuple>;

  /**
   * Stores `checkpoint` as a child of `locator.checkpoint_id` and returns the
   * locator of the stored checkpoint.
   */
  put(
    locator: CheckpointLocator,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
  ): Promise<Required<CheckpointLocator>>;

  close(): Promise<void>;
}

export const InjectCheckpointer = () => Inject(CHECKPOINTER);
