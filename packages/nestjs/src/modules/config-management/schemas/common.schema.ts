import * as Joi from "joi";

import { APP_LOG_LEVELS, NodeEnv } from "../types/config.types";

export const commonValidationSchema = Joi.object({
  // Environment
  NODE_ENV: Joi.string()
    .valid(...Object.values(NodeEnv))
    .default(NodeEnv.DEVELOPMENT),
  LOG_LEVEL: Joi.string()
    .valid(...APP_LOG_LEVELS)
    .default("log")
    .description("Most verbose level the bootstrap logger prints"),
});
