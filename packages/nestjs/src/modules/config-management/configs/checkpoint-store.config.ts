import { registerAs } from "@nestjs/config";

import { CheckpointStoreBackend } from "../types/config.types";

export default registerAs("checkpoint-store", () => {
  return {
    backend:
      process.env.USE_INMEMORY_SAVER === "true"
        ? CheckpointStoreBackend.MEMORY
        : CheckpointStoreBackend.POSTGRES,
    databaseUri: process.env.DATABASE_URI,
    poolMax: Number.parseInt(process.env.DATABASE_POOL_MAX ?? "10", 10),
    connectionTimeoutMs: Number.parseInt(
      process.env.DATABASE_CONNECTION_TIMEOUT_MS ?? "5000",
      10,
    ),
    statementTimeoutMs: Number.parseInt(
      process.env.DATABASE_STATEMENT_TIMEOUT_MS ?? "10000",
      10,
    ),
    table: process.env.CHECKPOINT_TABLE || "checkpoints",
  };
});
