import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { AppModule } from "../app.module";
import {
  CHECKPOINTER,
  type CheckpointerPort,
} from "../modules/domains/checkpoint-storage/ports/checkpointer.port";
import { resolveLogLevels } from "./log-levels";

/**
 * Creates the checkpoint schema at the configured location and exits.
 */
async function bootstrap() {
  const logger = new Logger("Bootstrap");

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });

  try {
    const checkpointer = app.get<CheckpointerPort>(CHECKPOINTER);
    await checkpointer.setup();
    logger.log("Checkpoint storage is ready");
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    console.error("Error during checkpoint storage setup:", error);
    process.exit(1);
  });
}
