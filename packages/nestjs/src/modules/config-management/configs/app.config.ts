import { registerAs } from "@nestjs/config";

import {
  type AppLogLevel,
  LOG_LEVELS,
  LogFormat,
} from "../types/config.types";

const isLogLevel = (value: string | undefined): value is AppLogLevel =>
  LOG_LEVELS.some((level) => level === value);

export default registerAs("app", () => {
  const logLevel = process.env.LOG_LEVEL;

  return {
    port: Number.parseInt(process.env.PORT ?? "6655", 10),
    appEnv: process.env.APP_ENV || "local",
    agentName: process.env.AGENT_NAME || "agent-history",
    logLevel: isLogLevel(logLevel) ? logLevel : "log",
    logFormat:
      process.env.LOG_FORMAT === LogFormat.JSON
        ? LogFormat.JSON
        : LogFormat.TEXT,
  };
});
