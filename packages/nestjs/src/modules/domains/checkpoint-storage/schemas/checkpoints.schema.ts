export const CHECKPOINTS_TABLE = "checkpoints";

/**
 * One row per (thread_id, checkpoint_id). Payload columns hold codec output.
 */
export interface CheckpointRow {
  thread_id: string;
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
  checkpoint_bytes: Uint8Array;
  metadata_bytes: Uint8Array | null;
}

export const CHECKPOINT_COLUMNS =
  "thread_id, checkpoint_id, parent_checkpoint_id, checkpoint_bytes, metadata_bytes";

export const CREATE_CHECKPOINTS_TABLE = `
  CREATE TABLE IF NOT EXISTS ${CHECKPOINTS_TABLE} (
    thread_id TEXT NOT NULL,
    checkpoint_id TEXT NOT NULL,
    parent_checkpoint_id TEXT,
    checkpoint_bytes BLOB NOT NULL,
    metadata_bytes BLOB,
    PRIMARY KEY (thread_id, checkpoint_id)
  );
  CREATE INDEX IF NOT EXISTS ${CHECKPOINTS_TABLE}_recency_idx
    ON ${CHECKPOINTS_TABLE} (checkpoint_id DESC, thread_id DESC);
`;

export const UPSERT_CHECKPOINT = `INSERT OR REPLACE INTO ${CHECKPOINTS_TABLE} (${CHECKPOINT_COLUMNS}) VALUES (?, ?, ?, ?, ?)`;
