import type { LogLevel } from "@nestjs/common";

import { type AppLogLevel, LOG_LEVELS } from "../../modules/config-management";

/**
 * Every level at or above `minimum`, in the order Nest expects.
 */
export const resolveLogLevels = (minimum: AppLogLevel): LogLevel[] =>
  LOG_LEVELS.slice(LOG_LEVELS.indexOf(minimum));
