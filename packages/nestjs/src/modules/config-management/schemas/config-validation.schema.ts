import * as Joi from "joi";

import { checkpointStorageValidationSchema } from "./checkpoint-storage.schema";
import { commonValidationSchema } from "./common.schema";

export const configValidationSchema = Joi.any()
  .concat(commonValidationSchema)
  .concat(checkpointStorageValidationSchema);
