import { Controller, Get } from "@nestjs/common";
import {
  DiskHealthIndicator,
  HealthCheck,
  HealthCheckService,
} from "@nestjs/terminus";

import { CheckpointStoreHealthIndicator } from "../indicators/checkpoint-store.health-indicator";

@Controller("health")
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private readonly disk: DiskHealthIndicator,
    private readonly checkpointStore: CheckpointStoreHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () =>
        this.disk.checkStorage("storage", { path: "/", thresholdPercent: 0.9 }),
      () => this.checkpointStore.isHealthy("checkpoint-store"),
    ]);
  }
}
