import * as Joi from "joi";

import { LOG_LEVELS, LogFormat, NodeEnv } from "../types/config.types";

export const commonValidationSchema = Joi.object({
  // Environment
  NODE_ENV: Joi.string()
    .valid(...Object.values(NodeEnv))
    .default(NodeEnv.DEVELOPMENT),
  PORT: Joi.number().default(6655),
  APP_ENV: Joi.string()
    .default("local")
    .description("Deployment environment name, embedded in trace ids"),
  AGENT_NAME: Joi.string()
    .default("agent-history")
    .description("Service name, used as the trace id prefix"),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid(...LOG_LEVELS)
    .default("log")
    .description("Lowest log level that is written"),
  LOG_FORMAT: Joi.string()
    .valid(...Object.values(LogFormat))
    .default(LogFormat.TEXT),
});
