import { IsNotEmpty, IsString } from "class-validator";

import type { ChatMessage } from "../../../../../common/types/chat-message.type";

export class HistoryParamsDto {
  @IsString()
  @IsNotEmpty()
  threadId!: string;
}

export interface ChatHistoryResponseDto {
  messages: ChatMessage[];
}
