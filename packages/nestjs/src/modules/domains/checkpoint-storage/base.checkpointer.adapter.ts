import { Logger } from "@nestjs/common";

import {
  CheckpointError,
  DecodeError,
  describeError,
  InvalidArgumentError,
} from "./errors/checkpoint.errors";
import type { CheckpointerPort } from "./ports/checkpointer.port";
import type { CheckpointRow } from "./schemas/checkpoints.schema";
import { LegacyCompatSerializer } from "./serde/legacy-compat.serializer";
import type { SerializerProtocol } from "./serde/serializer.port";
import type {
  Checkpoint,
  CheckpointListOptions,
  CheckpointLocator,
  CheckpointMetadata,
  CheckpointTuple,
  MetadataFilter,
} from "./types/checkpoint.types";
import { toCheckpoint, toMetadata } from "./utils/checkpoint.utils";
import { WriteGuard } from "./utils/write-guard";

export interface EncodedCheckpoint {
  checkpointBytes: Uint8Array;
  metadataBytes: Uint8Array;
}

/**
 * Shared plumbing for checkpoint backends: the one-shot setup gate, the write
 * guard and the codec round trip between rows and tuples.
 */
export abstract class BaseCheckpointerAdapter implements CheckpointerPort {
  protected readonly logger = new Logger(this.constructor.name);

  protected readonly guard = new WriteGuard();

  private setupPromise?: Promise<void>;

  constructor(
    protected readonly serde: SerializerProtocol = new LegacyCompatSerializer(),
  ) {}

  /**
   * Concurrent first callers share one schema creation, which runs inside the
   * write guard. A failed attempt is forgotten so the next call retries.
   */
  setup(): Promise<void> {
    this.setupPromise ??= this.guard
      .runExclusive(() => this.createSchema())
      .catch((error: unknown) => {
        this.setupPromise = undefined;
        throw error;
      });
    return this.setupPromise;
  }

  async get(locator: CheckpointLocator): Promise<Checkpoint | undefined> {
    const tuple = await this.getTuple(locator);
    return tuple?.checkpoint;
  }

  protected abstract createSchema(): void | Promise<void>;

  abstract getTuple(
    locator: CheckpointLocator,
  ): Promise<CheckpointTuple | undefined>;

  abstract list(
    locator: CheckpointLocator,
    options?: CheckpointListOptions,
  ): AsyncGenerator<CheckpointTuple>;

  abstract search(
    filter: MetadataFilter,
    options?: CheckpointListOptions,
  ): AsyncGenerator<CheckpointTuple>;

  abstract put(
    locator: CheckpointLocator,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
  ): Promise<Required<CheckpointLocator>>;

  abstract close(): Promise<void>;

  protected async encode(
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
  ): Promise<EncodedCheckpoint> {
    try {
      const [checkpointBytes, metadataBytes] = await Promise.all([
        this.serde.dumps(checkpoint),
        this.serde.dumps(metadata ?? {}),
      ]);
      return { checkpointBytes, metadataBytes };
    } catch (error) {
      if (error instanceof CheckpointError) {
        throw error;
      }
      throw new InvalidArgumentError(
        `Failed to serialize checkpoint "${checkpoint.id}": ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  protected async decodeMetadata(
    row: CheckpointRow,
  ): Promise<CheckpointMetadata> {
    if (row.metadata_bytes === null) {
      return {};
    }
    return this.decode(row, "metadata", row.metadata_bytes, toMetadata);
  }

  protected async toTuple(row: CheckpointRow): Promise<CheckpointTuple> {
    const [checkpoint, metadata] = await Promise.all([
      this.decode(row, "checkpoint", row.checkpoint_bytes, (value) =>
        toCheckpoint(value, row.checkpoint_id),
      ),
      this.decodeMetadata(row),
    ]);
    const tuple: CheckpointTuple = {
      config: {
        thread_id: row.thread_id,
        checkpoint_id: row.checkpoint_id,
      },
      checkpoint,
      metadata,
    };

    if (row.parent_checkpoint_id) {
      tuple.parentConfig = {
        thread_id: row.thread_id,
        checkpoint_id: row.parent_checkpoint_id,
      };
    }

    return tuple;
  }

  private async decode<T>(
    row: CheckpointRow,
    field: "checkpoint" | "metadata",
    data: Uint8Array,
    shape: (value: unknown) => T,
  ): Promise<T> {
    try {
      return shape(await this.serde.loads(data));
    } catch (error) {
      throw new DecodeError(
        `Failed to decode ${field} of checkpoint "${row.checkpoint_id}" in thread "${row.thread_id}": ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
