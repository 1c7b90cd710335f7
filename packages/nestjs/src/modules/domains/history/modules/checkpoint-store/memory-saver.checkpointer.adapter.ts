import { type BaseCheckpointSaver, MemorySaver } from "@langchain/langgraph";
import { Injectable, Logger, type OnModuleInit } from "@nestjs/common";

import type { CheckpointerPort } from "./ports/checkpointer.port";

/**
 * Process-wide saver for agents running in this process. Checkpoints live as
 * long as the process does.
 */
@Injectable()
export class MemorySaverCheckpointerAdapter
  implements CheckpointerPort, OnModuleInit
{
  private readonly logger = new Logger(MemorySaverCheckpointerAdapter.name);

  public instance!: BaseCheckpointSaver;

  onModuleInit() {
    this.instance = new MemorySaver();
    this.logger.log("In-memory checkpoint saver ready");
  }
}
