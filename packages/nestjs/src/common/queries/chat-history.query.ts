import { Query } from "@nestjs/cqrs";

import type { ChatMessage } from "../types/chat-message.type";
import type { RequestContext } from "../types/request-context.type";

/**
 * Query for the reconstructed transcript of a conversation thread
 */
export class ChatHistoryQuery extends Query<ChatMessage[]> {
  readonly threadId: string;

  /**
   * Logging context of the request that asked for the history
   */
  readonly context?: RequestContext;

  /**
   * Aborts the reconstruction, e.g. when the client goes away
   */
  readonly signal?: AbortSignal;

  constructor(params: {
    threadId: string;
    context?: RequestContext;
    signal?: AbortSignal;
  }) {
    super();

    this.threadId = params.threadId;
    this.context = params.context;
    this.signal = params.signal;
  }

  static create(threadId: string): ChatHistoryQuery {
    return new ChatHistoryQuery({ threadId });
  }
}
