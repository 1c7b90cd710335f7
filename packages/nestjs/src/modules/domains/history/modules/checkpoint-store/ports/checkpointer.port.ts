import type { BaseCheckpointSaver } from "@langchain/langgraph";
import { Inject } from "@nestjs/common";

export const CHECKPOINTER = Symbol("checkpointer");

/**
 * The LangGraph saver shared with in-process producers. The history service
 * only ever reads from it.
 */
export interface CheckpointerPort {
  instance: BaseCheckpointSaver;
}

export const InjectCheckpointer = () => Inject(CHECKPOINTER);
