import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import appConfig from "./configs/app.config";
import checkpointStoreConfig from "./configs/checkpoint-store.config";
import jwtConfig from "./configs/jwt.config";
import requestLoggingConfig from "./configs/request-logging.config";
import { configValidationSchema } from "./schemas";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      expandVariables: true,
      validationSchema: configValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
      load: [appConfig, checkpointStoreConfig, jwtConfig, requestLoggingConfig],
    }),
  ],
})
export class ConfigManagementModule {}
