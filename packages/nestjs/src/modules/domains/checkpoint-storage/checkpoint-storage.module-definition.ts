import { ConfigurableModuleBuilder } from "@nestjs/common";

import type { CheckpointStoreDriver } from "../../config-management";
import type { SerializerProtocol } from "./serde/serializer.port";

export interface CheckpointStorageModuleOptions {
  driver: CheckpointStoreDriver;
  /** SQLite file or ":memory:"; ignored by the memory driver */
  connectionString?: string;
  pageSize?: number;
  serde?: SerializerProtocol;
}

export const {
  ConfigurableModuleClass,
  MODULE_OPTIONS_TOKEN,
  OPTIONS_TYPE,
  ASYNC_OPTIONS_TYPE,
} = new ConfigurableModuleBuilder<CheckpointStorageModuleOptions>().build();
