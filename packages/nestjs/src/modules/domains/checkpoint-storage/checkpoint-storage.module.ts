import { type DynamicModule, Logger, Module } from "@nestjs/common";

import { CheckpointStoreDriver } from "../../config-management";
import {
  ASYNC_OPTIONS_TYPE,
  type CheckpointStorageModuleOptions,
  ConfigurableModuleClass,
  MODULE_OPTIONS_TOKEN,
  OPTIONS_TYPE,
} from "./checkpoint-storage.module-definition";
import { MemoryCheckpointerAdapter } from "./memory.checkpointer.adapter";
import { CHECKPOINTER, type CheckpointerPort } from "./ports/checkpointer.port";
import { SqliteCheckpointerAdapter } from "./sqlite.checkpointer.adapter";

export function createCheckpointer(
  options: CheckpointStorageModuleOptions,
): CheckpointerPort {
  const logger = new Logger(CheckpointStorageModule.name);

  switch (options.driver) {
    case CheckpointStoreDriver.MEMORY:
      logger.log("Using in-memory checkpoint storage");
      return new MemoryCheckpointerAdapter(options.serde);
    case CheckpointStoreDriver.SQLITE: {
      const connectionString = options.connectionString ?? ":memory:";
      logger.log(`Using SQLite checkpoint storage at ${connectionString}`);
      return SqliteCheckpointerAdapter.fromConnString(connectionString, {
        serde: options.serde,
        pageSize: options.pageSize,
      });
    }
  }
}

/**
 * Provides the configured `CheckpointerPort` under the `CHECKPOINTER` token.
 * The store's schema is created on module init and its handle is released on
 * module destroy.
 */
@Module({})
export class CheckpointStorageModule extends ConfigurableModuleClass {
  static register(options: typeof OPTIONS_TYPE): DynamicModule {
    return CheckpointStorageModule.withCheckpointer(
      ConfigurableModuleClass.register(options),
    );
  }

  static registerAsync(options: typeof ASYNC_OPTIONS_TYPE): DynamicModule {
    return CheckpointStorageModule.withCheckpointer(
      ConfigurableModuleClass.registerAsync(options),
    );
  }

  private static withCheckpointer(dynamicModule: DynamicModule): DynamicModule {
    const checkpointerProvider = {
      provide: CHECKPOINTER,
      inject: [MODULE_OPTIONS_TOKEN],
      useFactory: async (
        options: CheckpointStorageModuleOptions,
      ): Promise<CheckpointerPort> => {
        const checkpointer = createCheckpointer(options);
        await checkpointer.setup();
        return checkpointer;
      },
    };

    return {
      ...dynamicModule,
      // the builder stamps its own class here; importers re-export this one
      module: CheckpointStorageModule,
      providers: [...(dynamicModule.providers ?? []), checkpointerProvider],
      exports: [...(dynamicModule.exports ?? []), CHECKPOINTER],
    };
  }
}
