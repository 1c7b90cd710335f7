import { Module } from "@nestjs/common";
import { TerminusModule } from "@nestjs/terminus";

import { CheckpointStoreModule } from "../domains/history/modules/checkpoint-store/checkpoint-store.module";
import { HealthController } from "./controllers/health.controller";
import { CheckpointStoreHealthIndicator } from "./indicators/checkpoint-store.health-indicator";

@Module({
  imports: [TerminusModule, CheckpointStoreModule],
  controllers: [HealthController],
  providers: [CheckpointStoreHealthIndicator],
})
export class HealthModule {}
