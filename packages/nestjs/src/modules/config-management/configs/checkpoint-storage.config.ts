import { registerAs } from "@nestjs/config";

import {
  type CheckpointStorageConfig,
  CheckpointStoreDriver,
} from "../types/config.types";

const parseDriver = (value: string | undefined): CheckpointStoreDriver =>
  value === CheckpointStoreDriver.MEMORY
    ? CheckpointStoreDriver.MEMORY
    : CheckpointStoreDriver.SQLITE;

export default registerAs(
  "checkpointStorage",
  (): CheckpointStorageConfig => ({
    driver: parseDriver(process.env.CHECKPOINT_STORE_DRIVER),
    connectionString:
      process.env.CHECKPOINT_STORE_CONN_STRING ?? "checkpoints.sqlite",
    pageSize: Number.parseInt(
      process.env.CHECKPOINT_STORE_PAGE_SIZE ?? "100",
      10,
    ),
  }),
);
