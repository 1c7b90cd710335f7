import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationShutdown,
} from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { Pool, type QueryResult, type QueryResultRow } from "pg";

import checkpointStoreConfig from "../../../../../config-management/configs/checkpoint-store.config";

/**
 * Owns the PostgreSQL pool. The pool is created on first use, so a service
 * running on the in-memory backend never opens a connection.
 */
@Injectable()
export class PgPoolService implements OnApplicationShutdown {
  private readonly logger = new Logger(PgPoolService.name);
  private pool?: Pool;

  constructor(
    @Inject(checkpointStoreConfig.KEY)
    private readonly config: ConfigType<typeof checkpointStoreConfig>,
  ) {}

  query<R extends QueryResultRow>(
    text: string,
    values: unknown[] = [],
  ): Promise<QueryResult<R>> {
    return this.getPool().query<R>(text, values);
  }

  async onApplicationShutdown(): Promise<void> {
    const pool = this.pool;

    if (!pool) {
      return;
    }

    this.pool = undefined;
    await pool.end();
    this.logger.log("PostgreSQL pool closed");
  }

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.config.databaseUri,
        max: this.config.poolMax,
        connectionTimeoutMillis: this.config.connectionTimeoutMs,
        statement_timeout: this.config.statementTimeoutMs,
      });

      // errors from idle clients surface here, not on a query
      this.pool.on("error", (error) => {
        this.logger.error(
          `Idle PostgreSQL client error: ${error.message}`,
          error.stack,
        );
      });

      this.logger.log(
        `PostgreSQL pool created (max=${this.config.poolMax})`,
      );
    }

    return this.pool;
  }
}
