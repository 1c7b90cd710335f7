// eslint-disable-next-line simple-import-sort/imports
import otelSDK from "./tracing";

import { ConsoleLogger, Logger, ValidationPipe } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import type { ValidationError } from "class-validator";

import { AppModule } from "../app.module";
import { AppException, AppExceptionCode } from "../common/errors/app.exception";
import { AppExceptionFilter } from "../common/filters/app-exception.filter";
import { resolveLogLevels } from "../common/utils/logger.utils";
import appConfig from "../modules/config-management/configs/app.config";
import { LogFormat } from "../modules/config-management/types/config.types";

const logger = new Logger("Bootstrap");

const toValidationException = (errors: ValidationError[]) =>
  new AppException(
    errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join("; "),
    AppExceptionCode.BAD_REQUEST_ERROR,
  );

async function bootstrap() {
  otelSDK.start();

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.useLogger(
    new ConsoleLogger({
      logLevels: resolveLogLevels(config.logLevel),
      json: config.logFormat === LogFormat.JSON,
    }),
  );

  app.enableCors();
  app.useGlobalPipes(
    new ValidationPipe({ exceptionFactory: toValidationException }),
  );
  app.useGlobalFilters(new AppExceptionFilter());
  app.enableShutdownHooks();

  const server = await app.listen(config.port, "0.0.0.0");
  const serverDetails = server.address();

  if (serverDetails && typeof serverDetails !== "string") {
    logger.log(
      `Listening on ${serverDetails.family} ${serverDetails.address}:${serverDetails.port}`,
    );
  }

  return app;
}

async function closeGracefully(signal: NodeJS.Signals) {
  logger.log(`Received signal to terminate: ${signal}`);

  try {
    const nestApp = await app;

    await Promise.all([nestApp.close(), otelSDK.shutdown()]);

    logger.log("Application closed gracefully");
    process.exit(0);
  } catch (error: unknown) {
    logger.error(
      "Error during graceful shutdown",
      error instanceof Error ? error.stack : String(error),
    );

    process.exit(1);
  }
}

process.on("SIGINT", (signal) => void closeGracefully(signal));
process.on("SIGTERM", (signal) => void closeGracefully(signal));

// Start the Application
const app = bootstrap();

app.catch((error: unknown) => {
  logger.fatal(
    "Application failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
