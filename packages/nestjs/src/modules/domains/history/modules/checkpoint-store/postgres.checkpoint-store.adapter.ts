import { Inject, Injectable } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";

import {
  isAbortError,
  raceAbort,
} from "../../../../../common/utils/abort.utils";
import { isRecord } from "../../../../../common/utils/record.utils";
import { CheckpointStoreBackend } from "../../../../config-management";
import checkpointStoreConfig from "../../../../config-management/configs/checkpoint-store.config";
import { StoreUnavailableError } from "./errors/store-unavailable.error";
import type { CheckpointStorePort } from "./ports/checkpoint-store.port";
import type { CheckpointRecord } from "./schemas/checkpoint-record.interface";
import { toCheckpointRecord } from "./schemas/checkpoint-record.mapper";
import { PgPoolService } from "./services/pg-pool.service";

// a type alias, since pg rows must be indexable
type CheckpointRow = {
  thread_id: string;
  checkpoint_id: string;
  checkpoint: unknown;
  metadata: unknown;
};

export const quoteTableName = (table: string): string =>
  table
    .split(".")
    .map((part) => `"${part}"`)
    .join(".");

/**
 * Reads the `checkpoints` table written by the LangGraph PostgreSQL saver.
 */
@Injectable()
export class PostgresCheckpointStoreAdapter implements CheckpointStorePort {
  readonly backend = CheckpointStoreBackend.POSTGRES;

  private readonly latestSql: string;
  private readonly allSql: string;

  constructor(
    private readonly pool: PgPoolService,
    @Inject(checkpointStoreConfig.KEY)
    config: ConfigType<typeof checkpointStoreConfig>,
  ) {
    const select = `SELECT thread_id, checkpoint_id, checkpoint, metadata FROM ${quoteTableName(config.table)} WHERE thread_id = $1`;

    this.latestSql = `${select} ORDER BY checkpoint_id DESC LIMIT 1`;
    this.allSql = `${select} ORDER BY checkpoint_id ASC`;
  }

  async latest(
    threadId: string,
    signal?: AbortSignal,
  ): Promise<CheckpointRecord | undefined> {
    const rows = await this.select(this.latestSql, threadId, signal);
    const [row] = rows;

    return row ? this.toRecord(row) : undefined;
  }

  async all(threadId: string, signal?: AbortSignal): Promise<CheckpointRecord[]> {
    const rows = await this.select(this.allSql, threadId, signal);
    return rows.map((row) => this.toRecord(row));
  }

  async ping(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    try {
      await raceAbort(this.pool.query("SELECT 1"), signal);
    } catch (error: unknown) {
      throw this.toStoreError(error, "PostgreSQL ping failed", signal);
    }
  }

  private async select(
    sql: string,
    threadId: string,
    signal?: AbortSignal,
  ): Promise<CheckpointRow[]> {
    signal?.throwIfAborted();

    try {
      const result = await raceAbort(
        this.pool.query<CheckpointRow>(sql, [threadId]),
        signal,
      );
      return result.rows;
    } catch (error: unknown) {
      throw this.toStoreError(
        error,
        `PostgreSQL checkpoint read failed for thread ${threadId}`,
        signal,
      );
    }
  }

  private toRecord(row: CheckpointRow): CheckpointRecord {
    const channelValues = isRecord(row.checkpoint)
      ? row.checkpoint.channel_values
      : undefined;

    return toCheckpointRecord(
      row.thread_id,
      row.checkpoint_id,
      channelValues,
      row.metadata,
    );
  }

  private toStoreError(
    error: unknown,
    message: string,
    signal?: AbortSignal,
  ): unknown {
    if (signal?.aborted || isAbortError(error)) {
      return error;
    }

    return new StoreUnavailableError(message, { cause: error });
  }
}
