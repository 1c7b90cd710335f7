import {
  type MiddlewareConsumer,
  Module,
  type NestModule,
} from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";

import { RequestLoggingMiddleware } from "./common/middleware/request-logging.middleware";
import { TraceMiddleware } from "./common/middleware/trace.middleware";
import { AuthModule } from "./modules/auth/auth.module";
import { ConfigManagementModule } from "./modules/config-management/config-management.module";
import { DomainsModule } from "./modules/domains/domains.module";
import { EntrypointsModule } from "./modules/entrypoints/entrypoints.module";
import { HealthModule } from "./modules/health/health.module";

@Module({
  imports: [
    ConfigManagementModule,
    HealthModule,
    CqrsModule.forRoot(),
    AuthModule,
    DomainsModule,
    EntrypointsModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    // trace first, so request logs carry the trace id
    consumer
      .apply(TraceMiddleware, RequestLoggingMiddleware)
      .forRoutes("{*splat}");
  }
}
