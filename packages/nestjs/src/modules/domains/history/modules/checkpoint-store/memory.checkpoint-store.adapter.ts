import type { RunnableConfig } from "@langchain/core/runnables";
import { Injectable } from "@nestjs/common";

import { isAbortError } from "../../../../../common/utils/abort.utils";
import { CheckpointStoreBackend } from "../../../../config-management";
import { StoreUnavailableError } from "./errors/store-unavailable.error";
import {
  type CheckpointerPort,
  InjectCheckpointer,
} from "./ports/checkpointer.port";
import type { CheckpointStorePort } from "./ports/checkpoint-store.port";
import type { CheckpointRecord } from "./schemas/checkpoint-record.interface";
import {
  compareSequenceKeys,
  toCheckpointRecord,
} from "./schemas/checkpoint-record.mapper";

/**
 * Reads the process-wide LangGraph saver. Only the root namespace is read,
 * which is where a graph keeps its own (non-subgraph) checkpoints.
 */
@Injectable()
export class MemoryCheckpointStoreAdapter implements CheckpointStorePort {
  readonly backend = CheckpointStoreBackend.MEMORY;

  constructor(
    @InjectCheckpointer() private readonly checkpointer: CheckpointerPort,
  ) {}

  async latest(
    threadId: string,
    signal?: AbortSignal,
  ): Promise<CheckpointRecord | undefined> {
    signal?.throwIfAborted();

    try {
      const tuple = await this.checkpointer.instance.getTuple(
        this.threadConfig(threadId),
      );

      return tuple
        ? toCheckpointRecord(
            threadId,
            tuple.checkpoint.id,
            tuple.checkpoint.channel_values,
            tuple.metadata,
          )
        : undefined;
    } catch (error: unknown) {
      throw this.toStoreError(error, threadId, signal);
    }
  }

  async all(threadId: string, signal?: AbortSignal): Promise<CheckpointRecord[]> {
    signal?.throwIfAborted();

    const records: CheckpointRecord[] = [];

    try {
      for await (const tuple of this.checkpointer.instance.list(
        this.threadConfig(threadId),
      )) {
        signal?.throwIfAborted();

        records.push(
          toCheckpointRecord(
            threadId,
            tuple.checkpoint.id,
            tuple.checkpoint.channel_values,
            tuple.metadata,
          ),
        );
      }
    } catch (error: unknown) {
      throw this.toStoreError(error, threadId, signal);
    }

    // savers list newest first
    return records.sort(compareSequenceKeys);
  }

  ping(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    return Promise.resolve();
  }

  private threadConfig(threadId: string): RunnableConfig {
    return { configurable: { thread_id: threadId, checkpoint_ns: "" } };
  }

  private toStoreError(
    error: unknown,
    threadId: string,
    signal?: AbortSignal,
  ): unknown {
    if (signal?.aborted || isAbortError(error)) {
      return error;
    }

    return new StoreUnavailableError(
      `In-memory checkpoint read failed for thread ${threadId}`,
      { cause: error },
    );
  }
}
