import { Module } from "@nestjs/common";

import { CheckpointStoreModule } from "../checkpoint-store/checkpoint-store.module";
import { ChatHistoryQueryHandler } from "./handlers/query/chat-history.query-handler";
import { MessageNormalizerService } from "./services/message-normalizer.service";
import { TranscriptReconstructorService } from "./services/transcript-reconstructor.service";

@Module({
  imports: [CheckpointStoreModule],
  providers: [
    MessageNormalizerService,
    TranscriptReconstructorService,
    ChatHistoryQueryHandler,
  ],
  exports: [TranscriptReconstructorService],
})
export class TranscriptModule {}
