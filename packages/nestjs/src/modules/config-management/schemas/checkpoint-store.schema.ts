import * as Joi from "joi";

/**
 * A table name, optionally schema-qualified. It is interpolated into SQL, so
 * nothing but identifier characters is accepted.
 */
export const SQL_IDENTIFIER_PATTERN =
  /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export const checkpointStoreValidationSchema = Joi.object({
  USE_INMEMORY_SAVER: Joi.boolean().sensitive()
    .default(false)
    .description(
      "When true, history is read from the in-process checkpointer instead of PostgreSQL",
    ),
  DATABASE_URI: Joi.any()
    .when("USE_INMEMORY_SAVER", {
      is: false,
      then: Joi.string()
        .uri({ scheme: ["postgres", "postgresql"] })
        .required(),
      otherwise: Joi.string().optional(),
    })
    .description("PostgreSQL connection string holding the checkpoints table"),
  DATABASE_POOL_MAX: Joi.number().integer().min(1).default(10),
  DATABASE_CONNECTION_TIMEOUT_MS: Joi.number().integer().min(0).default(5000),
  DATABASE_STATEMENT_TIMEOUT_MS: Joi.number().integer().min(0).default(10000),
  CHECKPOINT_TABLE: Joi.string()
    .pattern(SQL_IDENTIFIER_PATTERN)
    .default("checkpoints"),
});
