import Joi from "joi";

import { checkpointStoreValidationSchema } from "./checkpoint-store.schema";
import { commonValidationSchema } from "./common.schema";
import { jwtValidationSchema } from "./jwt.schema";
import { requestLoggingValidationSchema } from "./request-logging.schema";

export const configValidationSchema = Joi.any()
  .concat(checkpointStoreValidationSchema)
  .concat(commonValidationSchema)
  .concat(jwtValidationSchema)
  .concat(requestLoggingValidationSchema);
