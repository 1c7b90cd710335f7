import { Module } from "@nestjs/common";

import { CheckpointStoreModule } from "./modules/checkpoint-store/checkpoint-store.module";
import { TranscriptModule } from "./modules/transcript/transcript.module";

@Module({
  imports: [CheckpointStoreModule, TranscriptModule],
  exports: [CheckpointStoreModule],
})
export class HistoryModule {}
