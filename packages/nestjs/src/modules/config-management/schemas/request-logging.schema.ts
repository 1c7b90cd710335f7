import * as Joi from "joi";

export const requestLoggingValidationSchema = Joi.object({
  REQUEST_LOGGING_ENABLED: Joi.boolean().sensitive().default(true),
  REQUEST_LOG_HEADERS: Joi.boolean().sensitive().default(false),
  REQUEST_LOG_BODY: Joi.boolean().sensitive().default(false),
  REQUEST_LOG_BODY_MAX_SIZE: Joi.number()
    .integer()
    .min(0)
    .default(1024)
    .description(
      "Bodies larger than this many bytes are truncated; 0 logs any size",
    ),
});
