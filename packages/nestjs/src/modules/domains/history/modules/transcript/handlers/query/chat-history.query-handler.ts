import { Injectable, Logger } from "@nestjs/common";
import { type IQueryHandler, QueryHandler } from "@nestjs/cqrs";

import { ChatHistoryQuery } from "../../../../../../../common/queries/chat-history.query";
import type { ChatMessage } from "../../../../../../../common/types/chat-message.type";
import { withTrace } from "../../../../../../../common/types/request-context.type";
import { isAbortError } from "../../../../../../../common/utils/abort.utils";
import { TranscriptReconstructorService } from "../../services/transcript-reconstructor.service";

@QueryHandler(ChatHistoryQuery)
@Injectable()
export class ChatHistoryQueryHandler
  implements IQueryHandler<ChatHistoryQuery, ChatMessage[]>
{
  private readonly logger = new Logger(ChatHistoryQueryHandler.name);

  constructor(private readonly reconstructor: TranscriptReconstructorService) {}

  async execute(query: ChatHistoryQuery): Promise<ChatMessage[]> {
    const startTime = Date.now();

    try {
      this.logger.log(
        withTrace(
          query.context,
          `Processing chat history query for thread: ${query.threadId}`,
        ),
      );

      const messages = await this.reconstructor.reconstruct(query.threadId, {
        signal: query.signal,
        context: query.context,
      });

      this.logger.log(
        withTrace(
          query.context,
          `Retrieved ${messages.length} messages for thread ${query.threadId} in ${Date.now() - startTime}ms`,
        ),
      );

      return messages;
    } catch (error: unknown) {
      if (query.signal?.aborted || isAbortError(error)) {
        this.logger.warn(
          withTrace(
            query.context,
            `Chat history query for thread ${query.threadId} was cancelled`,
          ),
        );
        throw error;
      }

      const errorObj =
        error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        withTrace(
          query.context,
          `Chat history query failed: ${errorObj.message}`,
        ),
        errorObj.stack,
      );
      return [];
    }
  }
}
