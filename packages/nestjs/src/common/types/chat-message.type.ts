/**
 * Canonical message shape returned by the history endpoints.
 */
export type ChatMessageType = "human" | "ai" | "tool";

export interface ToolCall {
  name: string;
  args: Record<string, unknown>;
  id: string | null;
}

export interface ChatMessage {
  type: ChatMessageType;
  content: string;

  /**
   * Tool invocations requested by an `ai` turn. Present whenever the raw
   * message carried candidates, even if every candidate was malformed.
   */
  toolCalls?: ToolCall[];

  /**
   * Identity of a `tool` turn: the call it answers and the tool's name.
   */
  toolCallId?: string;
  name?: string;

  responseMetadata?: Record<string, unknown>;

  // tracking fields copied from the owning checkpoint
  runId?: string;
  threadId?: string;
  sessionId?: string;
}
