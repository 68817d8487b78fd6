import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import checkpointStorageConfig from "./configs/checkpoint-storage.config";
import { configValidationSchema } from "./schemas/config-validation.schema";

@Module({
  imports: [
    ConfigModule.forRoot({
      expandVariables: true,
      validationSchema: configValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
      load: [checkpointStorageConfig],
    }),
  ],
})
export class ConfigManagementModule {}
