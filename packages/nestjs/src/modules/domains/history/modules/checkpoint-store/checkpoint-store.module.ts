import { Module } from "@nestjs/common";
import { ConfigModule, type ConfigType } from "@nestjs/config";

import checkpointStoreConfig from "../../../../config-management/configs/checkpoint-store.config";
import { CheckpointStoreBackend } from "../../../../config-management";
import { MemoryCheckpointStoreAdapter } from "./memory.checkpoint-store.adapter";
import { MemorySaverCheckpointerAdapter } from "./memory-saver.checkpointer.adapter";
import { CHECKPOINT_STORE } from "./ports/checkpoint-store.port";
import { CHECKPOINTER } from "./ports/checkpointer.port";
import { PostgresCheckpointStoreAdapter } from "./postgres.checkpoint-store.adapter";
import { PgPoolService } from "./services/pg-pool.service";

@Module({
  imports: [ConfigModule.forFeature(checkpointStoreConfig)],
  providers: [
    {
      provide: CHECKPOINTER,
      useClass: MemorySaverCheckpointerAdapter,
    },
    PgPoolService,
    MemoryCheckpointStoreAdapter,
    PostgresCheckpointStoreAdapter,
    {
      provide: CHECKPOINT_STORE,
      inject: [
        checkpointStoreConfig.KEY,
        MemoryCheckpointStoreAdapter,
        PostgresCheckpointStoreAdapter,
      ],
      useFactory: (
        config: ConfigType<typeof checkpointStoreConfig>,
        memory: MemoryCheckpointStoreAdapter,
        postgres: PostgresCheckpointStoreAdapter,
      ) =>
        config.backend === CheckpointStoreBackend.MEMORY ? memory : postgres,
    },
  ],
  exports: [CHECKPOINTER, CHECKPOINT_STORE],
})
export class CheckpointStoreModule {}
