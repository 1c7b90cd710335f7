import { Inject } from "@nestjs/common";

import type { CheckpointStoreBackend } from "../../../../../config-management";
import type { CheckpointRecord } from "../schemas/checkpoint-record.interface";

export const CHECKPOINT_STORE = Symbol("checkpoint-store");

/**
 * Read-only access to the checkpoints of a thread, whatever holds them.
 */
export interface CheckpointStorePort {
  readonly backend: CheckpointStoreBackend;

  /**
   * The newest checkpoint of the thread, or `undefined` when it has none.
   */
  latest(
    threadId: string,
    signal?: AbortSignal,
  ): Promise<CheckpointRecord | undefined>;

  /**
   * Every checkpoint of the thread, oldest first.
   */
  all(threadId: string, signal?: AbortSignal): Promise<CheckpointRecord[]>;

  ping(signal?: AbortSignal): Promise<void>;
}

export const InjectCheckpointStore = () => Inject(CHECKPOINT_STORE);
