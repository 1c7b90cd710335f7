import {
  Controller,
  Get,
  Logger,
  Param,
  Req,
  Res,
  UseGuards,
} from "@nestjs/common";
import { QueryBus } from "@nestjs/cqrs";
import type { Response } from "express";

import { ChatHistoryQuery } from "../../../../../common/queries/chat-history.query";
import { withTrace } from "../../../../../common/types/request-context.type";
import { JwtAuthGuard } from "../../../../auth/guards/jwt-auth.guard";
import type { AuthenticatedRequest } from "../../../../auth/types/auth.types";
import {
  type ChatHistoryResponseDto,
  HistoryParamsDto,
} from "../dtos/history.dto";

@Controller("v1/history")
@UseGuards(JwtAuthGuard)
export class HistoryController {
  private readonly logger = new Logger(HistoryController.name);

  constructor(private readonly queryBus: QueryBus) {}

  @Get(":threadId")
  async getHistory(
    @Param() params: HistoryParamsDto,
    @Req() request: AuthenticatedRequest,
    @Res({ passthrough: true }) response: Response,
  ): Promise<ChatHistoryResponseDto> {
    const { threadId } = params;

    this.logger.log(
      withTrace(
        request.context,
        `History request for thread ${threadId} (X-Token header ${request.headers["x-token"] ? "present" : "absent"})`,
      ),
    );

    const controller = new AbortController();
    const onClose = () => {
      if (!response.writableEnded) {
        controller.abort();
      }
    };
    response.on("close", onClose);

    try {
      const messages = await this.queryBus.execute(
        new ChatHistoryQuery({
          threadId,
          context: request.context,
          signal: controller.signal,
        }),
      );

      return { messages };
    } finally {
      response.off("close", onClose);
    }
  }
}
