import { Module } from "@nestjs/common";
import { ConfigModule, type ConfigType } from "@nestjs/config";

import checkpointStorageConfig from "../config-management/configs/checkpoint-storage.config";
import { CheckpointStorageModule } from "./checkpoint-storage/checkpoint-storage.module";

@Module({
  imports: [
    CheckpointStorageModule.registerAsync({
      imports: [ConfigModule.forFeature(checkpointStorageConfig)],
      inject: [checkpointStorageConfig.KEY],
      useFactory: (config: ConfigType<typeof checkpointStorageConfig>) => ({
        driver: config.driver,
        connectionString: config.connectionString,
        pageSize: config.pageSize,
      }),
    }),
  ],
  exports: [CheckpointStorageModule],
})
export class DomainsModule {}
