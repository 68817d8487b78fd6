import * as Joi from "joi";

import { CheckpointStoreDriver } from "../types/config.types";

export const checkpointStorageValidationSchema = Joi.object({
  CHECKPOINT_STORE_DRIVER: Joi.string()
    .valid(...Object.values(CheckpointStoreDriver))
    .default(CheckpointStoreDriver.SQLITE)
    .description("Backend that persists checkpoints"),
  CHECKPOINT_STORE_CONN_STRING: Joi.string()
    .default("checkpoints.sqlite")
    .description(
      "SQLite database file, or ':memory:' for a database that lives as long as the process",
    ),
  CHECKPOINT_STORE_PAGE_SIZE: Joi.number()
    .integer()
    .min(1)
    .max(10_000)
    .default(100)
    .description("Rows fetched per round trip while streaming list and search"),
});
