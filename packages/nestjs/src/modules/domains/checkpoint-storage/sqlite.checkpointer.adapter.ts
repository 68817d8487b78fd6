import type { OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import Database from "better-sqlite3";

import { BaseCheckpointerAdapter } from "./base.checkpointer.adapter";
import {
  describeError,
  InvalidArgumentError,
  isCheckpointError,
  StorageError,
} from "./errors/checkpoint.errors";
import type { SqlValue } from "./query/metadata-filter";
import { searchWhere, type WhereClause } from "./query/search-where";
import {
  CHECKPOINT_COLUMNS,
  type CheckpointRow,
  CHECKPOINTS_TABLE,
  CREATE_CHECKPOINTS_TABLE,
  UPSERT_CHECKPOINT,
} from "./schemas/checkpoints.schema";
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

export const DEFAULT_PAGE_SIZE = 100;

export interface SqliteCheckpointerOptions {
  serde?: SerializerProtocol;
  /** Rows fetched per query while streaming `list` and `search` */
  pageSize?: number;
}

type UpsertParams = [string, string, string | null, Buffer, Buffer];

const SELECT_CHECKPOINTS = `SELECT ${CHECKPOINT_COLUMNS} FROM ${CHECKPOINTS_TABLE}`;

const toBuffer = (bytes: Uint8Array): Buffer =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

/**
 * Checkpoint saver backed by a SQLite database through better-sqlite3.
 *
 * The adapter owns its handle: `close()` (or leaving `withConnString`) closes
 * it. Writes go through the write guard; reads do not. `list` and `search`
 * page through results with keyset pagination, so no statement stays open
 * between yields and a `put` may run while a listing is being consumed.
 *
 * @example
 * const saver = SqliteCheckpointerAdapter.fromConnString(":memory:");
 * const config = await saver.put({ thread_id: "1" }, emptyCheckpoint(), {
 *   source: "input",
 *   step: -1,
 *   parents: {},
 * });
 * const latest = await saver.getTuple({ thread_id: "1" });
 */
export class SqliteCheckpointerAdapter
  extends BaseCheckpointerAdapter
  implements OnModuleInit, OnModuleDestroy
{
  private readonly pageSize: number;

  constructor(
    private readonly db: Database.Database,
    options: SqliteCheckpointerOptions = {},
  ) {
    super(options.serde);

    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new InvalidArgumentError(
        `"pageSize" must be a positive integer, got ${pageSize}.`,
      );
    }
    this.pageSize = pageSize;
  }

  /**
   * Opens a database file, or an in-memory database for ":memory:".
   */
  static fromConnString(
    connString: string,
    options: SqliteCheckpointerOptions = {},
  ): SqliteCheckpointerAdapter {
    let db: Database.Database;
    try {
      db = new Database(connString);
      if (!db.memory) {
        db.pragma("journal_mode = WAL");
      }
    } catch (error) {
      throw new StorageError(
        `Failed to open SQLite database "${connString}": ${describeError(error)}`,
        { cause: error },
      );
    }
    return new SqliteCheckpointerAdapter(db, options);
  }

  /**
   * Runs `fn` with a saver opened on `connString` and closes it afterwards,
   * whether `fn` returns or throws.
   */
  static async withConnString<T>(
    connString: string,
    fn: (saver: SqliteCheckpointerAdapter) => T | Promise<T>,
    options: SqliteCheckpointerOptions = {},
  ): Promise<T> {
    const saver = SqliteCheckpointerAdapter.fromConnString(connString, options);
    try {
      return await fn(saver);
    } finally {
      await saver.close();
    }
  }

  async onModuleInit(): Promise<void> {
    await this.setup();
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  protected createSchema(): void {
    this.withStorage("setup", () => this.db.exec(CREATE_CHECKPOINTS_TABLE));
    this.logger.debug(`Ensured "${CHECKPOINTS_TABLE}" table exists`);
  }

  async getTuple(
    locator: CheckpointLocator,
  ): Promise<CheckpointTuple | undefined> {
    this.logger.verbose("Starting GetTuple operation");
    const threadId = getThreadId(locator);
    const checkpointId = getCheckpointId(locator);

    await this.setup();

    const row = this.withStorage("getTuple", () =>
      checkpointId
        ? this.db
            .prepare<[string, string], CheckpointRow>(
              `${SELECT_CHECKPOINTS} WHERE thread_id = ? AND checkpoint_id = ?`,
            )
            .get(threadId, checkpointId)
        : this.db
            .prepare<[string], CheckpointRow>(
              `${SELECT_CHECKPOINTS} WHERE thread_id = ? ORDER BY checkpoint_id DESC LIMIT 1`,
            )
            .get(threadId),
    );

    return row ? this.toTuple(row) : undefined;
  }

  async *list(
    locator: CheckpointLocator,
    options: CheckpointListOptions = {},
  ): AsyncGenerator<CheckpointTuple> {
    this.logger.verbose("Starting List operation");
    const threadId = getThreadId(locator);
    const beforeId = getBoundCheckpointId(options.before);
    const limit = normalizeLimit(options.limit);

    await this.setup();

    const where: WhereClause =
      beforeId === undefined
        ? ["WHERE thread_id = ?", [threadId]]
        : ["WHERE thread_id = ? AND checkpoint_id < ?", [threadId, beforeId]];

    yield* this.stream("list", where, limit);
  }

  async *search(
    filter: MetadataFilter,
    options: CheckpointListOptions = {},
  ): AsyncGenerator<CheckpointTuple> {
    this.logger.verbose("Starting Search operation");
    const where = searchWhere(filter, options.before);
    const limit = normalizeLimit(options.limit);

    await this.setup();

    yield* this.stream("search", where, limit);
  }

  async put(
    locator: CheckpointLocator,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
  ): Promise<Required<CheckpointLocator>> {
    this.logger.verbose("Starting Put operation");
    const threadId = getThreadId(locator);
    const checkpointId = getNewCheckpointId(checkpoint);
    const parentCheckpointId = getCheckpointId(locator) ?? null;

    await this.setup();

    return this.guard.runExclusive(async () => {
      const { checkpointBytes, metadataBytes } = await this.encode(
        checkpoint,
        metadata,
      );

      this.withStorage("put", () =>
        this.db
          .prepare<UpsertParams>(UPSERT_CHECKPOINT)
          .run(
            threadId,
            checkpointId,
            parentCheckpointId,
            toBuffer(checkpointBytes),
            toBuffer(metadataBytes),
          ),
      );

      this.logger.debug(
        `Stored checkpoint ${checkpointId} for thread ${threadId}`,
      );

      return { thread_id: threadId, checkpoint_id: checkpointId };
    });
  }

  async close(): Promise<void> {
    // let an in-flight write finish before the handle goes away
    await this.guard.runExclusive(() => {
      if (this.db.open) {
        this.db.close();
        this.logger.debug("Closed SQLite connection");
      }
    });
  }

  /**
   * Yields rows matching `where`, newest first, fetching `pageSize` rows at
   * a time. Pages continue strictly after the last (checkpoint_id, thread_id)
   * seen, which is unique per row.
   */
  private async *stream(
    operation: string,
    [clause, params]: WhereClause,
    limit: number | undefined,
  ): AsyncGenerator<CheckpointTuple> {
    let remaining = limit;
    let cursor: [string, string] | undefined;

    while (remaining === undefined || remaining > 0) {
      const pageSize =
        remaining === undefined
          ? this.pageSize
          : Math.min(this.pageSize, remaining);

      const conditions = [clause];
      const values: SqlValue[] = [...params];
      if (cursor) {
        conditions.push(
          `${clause === "" ? "WHERE" : "AND"} (checkpoint_id, thread_id) < (?, ?)`,
        );
        values.push(...cursor);
      }
      const sql = [
        SELECT_CHECKPOINTS,
        ...conditions.filter((condition) => condition !== ""),
        `ORDER BY checkpoint_id DESC, thread_id DESC LIMIT ${pageSize}`,
      ].join(" ");

      const rows = this.withStorage(operation, () =>
        this.db.prepare<SqlValue[], CheckpointRow>(sql).all(...values),
      );

      for (const row of rows) {
        yield await this.toTuple(row);
      }

      if (remaining !== undefined) {
        remaining -= rows.length;
      }
      const last = rows[rows.length - 1];
      if (rows.length < pageSize || last === undefined) {
        return;
      }
      cursor = [last.checkpoint_id, last.thread_id];
    }
  }

  private withStorage<T>(operation: string, task: () => T): T {
    try {
      return task();
    } catch (error) {
      if (isCheckpointError(error)) {
        throw error;
      }
      this.logger.error(`Failed to ${operation} checkpoints:`, error);
      throw new StorageError(
        `SQLite ${operation} failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
