import "reflect-metadata";

import { Logger } from "@nestjs/common";

// Setup environment variables for tests
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "error";
process.env.CHECKPOINT_STORE_DRIVER = "sqlite";
process.env.CHECKPOINT_STORE_CONN_STRING = ":memory:";
process.env.CHECKPOINT_STORE_PAGE_SIZE = "100";

// Adapters log every operation at verbose/debug
Logger.overrideLogger(["error"]);
