import type { BaseMessage } from "@langchain/core/messages";

/**
 * A plain object that already carries its discriminator and content at the
 * top level, as messages do once they have been through a JSON round trip.
 */
export interface TypedMessageLike {
  type: string;
  content: unknown;
  [field: string]: unknown;
}

/**
 * A message as found in a checkpoint, tagged by how its fields are laid out.
 */
export type RawMessage =
  | { shape: "typed"; message: BaseMessage | TypedMessageLike }
  | {
      shape: "structured";
      /**
       * The `kwargs` of a serialized LangChain constructor record.
       */
      kwargs: Record<string, unknown>;
      /**
       * The constructor path (`id`) of the serialized record, when present.
       */
      constructorPath?: string[];
    };
