import { Injectable } from "@nestjs/common";
import { HealthIndicatorService } from "@nestjs/terminus";

import {
  type CheckpointStorePort,
  InjectCheckpointStore,
} from "../../domains/history/modules/checkpoint-store/ports/checkpoint-store.port";

const PING_TIMEOUT_MS = 3000;

@Injectable()
export class CheckpointStoreHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    @InjectCheckpointStore() private readonly store: CheckpointStorePort,
  ) {}

  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);

    try {
      await this.store.ping(AbortSignal.timeout(PING_TIMEOUT_MS));
      return indicator.up({ backend: this.store.backend });
    } catch (error: unknown) {
      return indicator.down({
        backend: this.store.backend,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
