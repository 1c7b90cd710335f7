import {
  type BaseMessage,
  isAIMessage,
  isBaseMessage,
  isToolMessage,
} from "@langchain/core/messages";
import { Injectable } from "@nestjs/common";
import { z } from "zod";

import type {
  ChatMessage,
  ToolCall,
} from "../../../../../../common/types/chat-message.type";
import { isRecord } from "../../../../../../common/utils/record.utils";
import type { CheckpointTrackingMetadata } from "../../checkpoint-store/schemas/checkpoint-record.interface";
import { UnsupportedMessageShapeError } from "../errors/unsupported-message-shape.error";
import type { RawMessage, TypedMessageLike } from "../types/raw-message.type";

export interface NormalizationMeta extends CheckpointTrackingMetadata {
  threadId?: string;
}

// anything malformed in an optional field is treated as absent
const messageFieldsSchema = z.object({
  type: z.string(),
  content: z.unknown(),
  tool_calls: z.array(z.unknown()).optional().catch(undefined),
  additional_kwargs: z.record(z.unknown()).optional().catch(undefined),
  response_metadata: z.record(z.unknown()).optional().catch(undefined),
  tool_call_id: z.string().optional().catch(undefined),
  name: z.string().optional().catch(undefined),
});

type MessageFields = z.infer<typeof messageFieldsSchema>;

const toolCallSchema = z.object({
  name: z.string(),
  args: z.record(z.unknown()),
  id: z.string().nullish().catch(null),
});

// serialized JS messages leave `type` out of kwargs
const CONSTRUCTOR_TYPES: Record<string, string> = {
  HumanMessage: "human",
  HumanMessageChunk: "human",
  AIMessage: "ai",
  AIMessageChunk: "ai",
  ToolMessage: "tool",
  ToolMessageChunk: "tool",
  SystemMessage: "system",
};

const isTypedMessageLike = (value: unknown): value is TypedMessageLike =>
  isRecord(value) && typeof value.type === "string" && "content" in value;

const flattenContent = (content: unknown): string => {
  if (typeof content === "string") {
    return content;
  }

  if (!Array.isArray(content)) {
    return "";
  }

  return content
    .map((part: unknown) => {
      if (typeof part === "string") {
        return part;
      }

      return isRecord(part) &&
        part.type === "text" &&
        typeof part.text === "string"
        ? part.text
        : "";
    })
    .join("");
};

/**
 * Converts the message shapes found in checkpoints into `ChatMessage`s.
 */
@Injectable()
export class MessageNormalizerService {
  /**
   * Tags a value with its shape, or returns `undefined` when it is not a
   * message at all.
   */
  classify(value: unknown): RawMessage | undefined {
    if (isBaseMessage(value)) {
      return { shape: "typed", message: value };
    }

    if (!isRecord(value)) {
      return undefined;
    }

    // serialized records have a top-level type of "constructor"
    if (isRecord(value.kwargs)) {
      const constructorPath = Array.isArray(value.id)
        ? value.id.filter((part): part is string => typeof part === "string")
        : undefined;

      return { shape: "structured", kwargs: value.kwargs, constructorPath };
    }

    if (isTypedMessageLike(value)) {
      return { shape: "typed", message: value };
    }

    return undefined;
  }

  /**
   * @throws UnsupportedMessageShapeError for anything but human, ai and tool
   * messages.
   */
  normalize(raw: RawMessage, meta: NormalizationMeta = {}): ChatMessage {
    const fields = this.parseFields(this.extractFields(raw));
    return this.enrich(this.toChatMessage(fields), meta);
  }

  /**
   * `classify` and `normalize` in one step.
   */
  normalizeValue(value: unknown, meta: NormalizationMeta = {}): ChatMessage {
    const raw = this.classify(value);

    if (!raw) {
      throw new UnsupportedMessageShapeError(
        `Not a message: ${Array.isArray(value) ? "array" : typeof value}`,
      );
    }

    return this.normalize(raw, meta);
  }

  private extractFields(raw: RawMessage): Record<string, unknown> {
    switch (raw.shape) {
      case "typed":
        return isBaseMessage(raw.message)
          ? this.fieldsOfBaseMessage(raw.message)
          : raw.message;
      case "structured":
        return {
          ...raw.kwargs,
          type: raw.kwargs.type ?? this.typeFromConstructor(raw.constructorPath),
        };
    }
  }

  private fieldsOfBaseMessage(message: BaseMessage): Record<string, unknown> {
    return {
      type: message.getType(),
      content: message.content,
      tool_calls: isAIMessage(message) ? message.tool_calls : undefined,
      additional_kwargs: message.additional_kwargs,
      response_metadata: message.response_metadata,
      tool_call_id: isToolMessage(message) ? message.tool_call_id : undefined,
      name: message.name,
    };
  }

  private typeFromConstructor(path?: string[]): string | undefined {
    const constructorName = path?.[path.length - 1];
    return constructorName ? CONSTRUCTOR_TYPES[constructorName] : undefined;
  }

  private parseFields(candidate: Record<string, unknown>): MessageFields {
    const parsed = messageFieldsSchema.safeParse(candidate);

    if (!parsed.success) {
      throw new UnsupportedMessageShapeError(
        "Message has no string type discriminator",
      );
    }

    return parsed.data;
  }

  private toChatMessage(fields: MessageFields): ChatMessage {
    const content = flattenContent(fields.content);

    switch (fields.type) {
      case "human":
        return this.withResponseMetadata({ type: "human", content }, fields);
      case "ai": {
        const message: ChatMessage = { type: "ai", content };
        const candidates = this.toolCallCandidates(fields);

        if (candidates.length > 0) {
          message.toolCalls = this.validToolCalls(candidates);
        }

        return this.withResponseMetadata(message, fields);
      }
      case "tool": {
        const message: ChatMessage = { type: "tool", content };

        if (fields.tool_call_id) {
          message.toolCallId = fields.tool_call_id;
        }
        if (fields.name) {
          message.name = fields.name;
        }

        return this.withResponseMetadata(message, fields);
      }
      default:
        throw new UnsupportedMessageShapeError(
          `Unsupported message type: ${fields.type}`,
        );
    }
  }

  private toolCallCandidates(fields: MessageFields): unknown[] {
    if (fields.tool_calls && fields.tool_calls.length > 0) {
      return fields.tool_calls;
    }

    const fallback = fields.additional_kwargs?.tool_calls;
    return Array.isArray(fallback) ? fallback : [];
  }

  private validToolCalls(candidates: unknown[]): ToolCall[] {
    const toolCalls: ToolCall[] = [];

    for (const candidate of candidates) {
      const parsed = toolCallSchema.safeParse(candidate);

      if (parsed.success) {
        toolCalls.push({
          name: parsed.data.name,
          args: parsed.data.args,
          id: parsed.data.id || null,
        });
      }
    }

    return toolCalls;
  }

  private withResponseMetadata(
    message: ChatMessage,
    fields: MessageFields,
  ): ChatMessage {
    const metadata = fields.response_metadata;

    if (metadata && Object.keys(metadata).length > 0) {
      message.responseMetadata = metadata;
    }

    return message;
  }

  private enrich(message: ChatMessage, meta: NormalizationMeta): ChatMessage {
    if (meta.runId) {
      message.runId = meta.runId;
    }
    if (meta.threadId) {
      message.threadId = meta.threadId;
    }
    if (meta.sessionId) {
      message.sessionId = meta.sessionId;
    }

    return message;
  }
}
