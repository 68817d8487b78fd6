import { BaseCheckpointerAdapter } from "./base.checkpointer.adapter";
import { StorageError } from "./errors/checkpoint.errors";
import {
  compileMetadataFilter,
  matchesMetadataFilter,
} from "./query/metadata-filter";
import type { CheckpointRow } from "./schemas/checkpoints.schema";
import type { SerializerProtocol } from "./serde/serializer.port";
import type {
  Checkpoint,
  CheckpointListOptions,
  CheckpointLocator,
  CheckpointMetadata,
  CheckpointTuple,
  MetadataFilter,
} from "./types/checkpoint.types";
import {
  getBoundCheckpointId,
  getCheckpointId,
  getNewCheckpointId,
  getThreadId,
  normalizeLimit,
} from "./utils/locator.utils";

// checkpoint_id DESC, then thread_id DESC
const newestFirst = (a: CheckpointRow, b: CheckpointRow): number => {
  if (a.checkpoint_id !== b.checkpoint_id) {
    return a.checkpoint_id < b.checkpoint_id ? 1 : -1;
  }
  if (a.thread_id !== b.thread_id) {
    return a.thread_id < b.thread_id ? 1 : -1;
  }
  return 0;
};

/**
 * Keeps serialized checkpoints in process memory. Same ordering, filter and
 * lineage behaviour as the SQLite adapter; nothing survives the process.
 */
export class MemoryCheckpointerAdapter extends BaseCheckpointerAdapter {
  private readonly storage = new Map<string, Map<string, CheckpointRow>>();

  private closed = false;

  constructor(serde?: SerializerProtocol) {
    super(serde);
  }

  protected createSchema(): void {
    this.assertOpen();
  }

  async getTuple(
    locator: CheckpointLocator,
  ): Promise<CheckpointTuple | undefined> {
    const threadId = getThreadId(locator);
    const checkpointId = getCheckpointId(locator);

    await this.setup();
    this.assertOpen();

    const rows = this.storage.get(threadId);
    if (!rows) {
      return undefined;
    }

    const row = checkpointId
      ? rows.get(checkpointId)
      : Array.from(rows.values()).sort(newestFirst)[0];

    return row ? this.toTuple(row) : undefined;
  }

  async *list(
    locator: CheckpointLocator,
    options: CheckpointListOptions = {},
  ): AsyncGenerator<CheckpointTuple> {
    const threadId = getThreadId(locator);
    const beforeId = getBoundCheckpointId(options.before);
    const limit = normalizeLimit(options.limit);

    await this.setup();
    this.assertOpen();

    const rows = Array.from(this.storage.get(threadId)?.values() ?? [])
      .filter((row) => beforeId === undefined || row.checkpoint_id < beforeId)
      .sort(newestFirst);

    yield* this.emit(rows, limit);
  }

  async *search(
    filter: MetadataFilter,
    options: CheckpointListOptions = {},
  ): AsyncGenerator<CheckpointTuple> {
    const compiled = compileMetadataFilter(filter);
    const beforeId = getBoundCheckpointId(options.before);
    const limit = normalizeLimit(options.limit);

    await this.setup();
    this.assertOpen();

    const rows: CheckpointRow[] = [];
    for (const threadRows of this.storage.values()) {
      for (const row of threadRows.values()) {
        if (beforeId === undefined || row.checkpoint_id < beforeId) {
          rows.push(row);
        }
      }
    }
    rows.sort(newestFirst);

    let remaining = limit;
    for (const row of rows) {
      if (remaining !== undefined && remaining <= 0) {
        return;
      }
      if (
        compiled.length > 0 &&
        !matchesMetadataFilter(await this.decodeMetadata(row), compiled)
      ) {
        continue;
      }
      yield await this.toTuple(row);
      if (remaining !== undefined) {
        remaining -= 1;
      }
    }
  }

  async put(
    locator: CheckpointLocator,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
  ): Promise<Required<CheckpointLocator>> {
    const threadId = getThreadId(locator);
    const checkpointId = getNewCheckpointId(checkpoint);
    const parentCheckpointId = getCheckpointId(locator) ?? null;

    await this.setup();

    return this.guard.runExclusive(async () => {
      this.assertOpen();
      const { checkpointBytes, metadataBytes } = await this.encode(
        checkpoint,
        metadata,
      );

      let rows = this.storage.get(threadId);
      if (!rows) {
        rows = new Map();
        this.storage.set(threadId, rows);
      }
      rows.set(checkpointId, {
        thread_id: threadId,
        checkpoint_id: checkpointId,
        parent_checkpoint_id: parentCheckpointId,
        checkpoint_bytes: checkpointBytes,
        metadata_bytes: metadataBytes,
      });

      return { thread_id: threadId, checkpoint_id: checkpointId };
    });
  }

  async close(): Promise<void> {
    await this.guard.runExclusive(() => {
      this.closed = true;
    });
  }

  private async *emit(
    rows: CheckpointRow[],
    limit: number | undefined,
  ): AsyncGenerator<CheckpointTuple> {
    const capped = limit === undefined ? rows : rows.slice(0, limit);
    for (const row of capped) {
      yield await this.toTuple(row);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError("The in-memory checkpoint store is closed");
    }
  }
}
