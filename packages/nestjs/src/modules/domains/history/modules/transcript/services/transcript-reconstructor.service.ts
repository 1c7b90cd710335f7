import { Injectable, Logger } from "@nestjs/common";

import type { ChatMessage } from "../../../../../../common/types/chat-message.type";
import {
  type RequestContext,
  withTrace,
} from "../../../../../../common/types/request-context.type";
import { isAbortError } from "../../../../../../common/utils/abort.utils";
import { isRecord } from "../../../../../../common/utils/record.utils";
import { StoreUnavailableError } from "../../checkpoint-store/errors/store-unavailable.error";
import {
  type CheckpointStorePort,
  InjectCheckpointStore,
} from "../../checkpoint-store/ports/checkpoint-store.port";
import type { CheckpointRecord } from "../../checkpoint-store/schemas/checkpoint-record.interface";
import { UnsupportedMessageShapeError } from "../errors/unsupported-message-shape.error";
import {
  MessageNormalizerService,
  type NormalizationMeta,
} from "./message-normalizer.service";

/**
 * Graph nodes whose writes carry conversation messages.
 */
export enum WriterStage {
  INIT = "__start__",
  TURN = "agent",
  TOOL = "tools",
}

// order in which one checkpoint's writes were produced
export const WRITER_STAGE_ORDER: readonly WriterStage[] = [
  WriterStage.INIT,
  WriterStage.TURN,
  WriterStage.TOOL,
];

export interface ReconstructOptions {
  signal?: AbortSignal;
  context?: RequestContext;
}

const messagesOf = (channel: unknown): unknown[] =>
  isRecord(channel) && Array.isArray(channel.messages) ? channel.messages : [];

/**
 * Rebuilds the ordered transcript of a thread from its checkpoints.
 *
 * The newest checkpoint's `messages` channel is used when it holds the full
 * conversation. Otherwise every checkpoint's per-stage writes are replayed in
 * order, skipping any message whose `(type, content)` was already seen.
 */
@Injectable()
export class TranscriptReconstructorService {
  private readonly logger = new Logger(TranscriptReconstructorService.name);

  constructor(
    @InjectCheckpointStore() private readonly store: CheckpointStorePort,
    private readonly normalizer: MessageNormalizerService,
  ) {}

  async reconstruct(
    threadId: string,
    { signal, context }: ReconstructOptions = {},
  ): Promise<ChatMessage[]> {
    try {
      signal?.throwIfAborted();

      const latest = await this.store.latest(threadId, signal);

      if (!latest) {
        this.logger.debug(
          withTrace(context, `No checkpoints for thread ${threadId}`),
        );
        return [];
      }

      const complete = this.fromSnapshot(latest, context);

      if (complete.length > 0) {
        return complete;
      }

      signal?.throwIfAborted();

      const checkpoints = await this.store.all(threadId, signal);
      return this.fromWrites(checkpoints, context);
    } catch (error: unknown) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }

      if (error instanceof StoreUnavailableError) {
        this.logger.error(
          withTrace(
            context,
            `Checkpoint store unavailable for thread ${threadId}: ${error.message}`,
          ),
          error.cause instanceof Error ? error.cause.stack : error.stack,
        );
      } else {
        const errorObj =
          error instanceof Error ? error : new Error(String(error));
        this.logger.error(
          withTrace(
            context,
            `Transcript reconstruction failed for thread ${threadId}: ${errorObj.message}`,
          ),
          errorObj.stack,
        );
      }

      return [];
    }
  }

  private fromSnapshot(
    latest: CheckpointRecord,
    context?: RequestContext,
  ): ChatMessage[] {
    const meta = this.metaOf(latest);
    const messages: ChatMessage[] = [];

    for (const value of messagesOf(latest.snapshot)) {
      const message = this.tryNormalize(value, meta, context);

      if (message) {
        messages.push(message);
      }
    }

    return messages;
  }

  private fromWrites(
    checkpoints: CheckpointRecord[],
    context?: RequestContext,
  ): ChatMessage[] {
    const transcript: ChatMessage[] = [];

    for (const checkpoint of checkpoints) {
      const meta = this.metaOf(checkpoint);
      const values = WRITER_STAGE_ORDER.flatMap((stage) =>
        messagesOf(checkpoint.deltaWrites[stage]),
      );

      for (const value of values) {
        const message = this.tryNormalize(value, meta, context);

        if (
          message &&
          !transcript.some(
            (seen) =>
              seen.type === message.type && seen.content === message.content,
          )
        ) {
          transcript.push(message);
        }
      }
    }

    return transcript;
  }

  private tryNormalize(
    value: unknown,
    meta: NormalizationMeta,
    context?: RequestContext,
  ): ChatMessage | undefined {
    try {
      return this.normalizer.normalizeValue(value, meta);
    } catch (error: unknown) {
      if (error instanceof UnsupportedMessageShapeError) {
        this.logger.debug(
          withTrace(context, `Skipping message: ${error.message}`),
        );
      } else {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          withTrace(context, `Failed to normalize message: ${message}`),
        );
      }

      return undefined;
    }
  }

  private metaOf(checkpoint: CheckpointRecord): NormalizationMeta {
    return {
      runId: checkpoint.metadata.runId,
      sessionId: checkpoint.metadata.sessionId,
      threadId: checkpoint.threadId,
    };
  }
}
