import { registerAs } from "@nestjs/config";

export default registerAs("request-logging", () => ({
  enabled: process.env.REQUEST_LOGGING_ENABLED !== "false",
  logHeaders: process.env.REQUEST_LOG_HEADERS === "true",
  logBody: process.env.REQUEST_LOG_BODY === "true",
  bodyMaxSize: Number.parseInt(
    process.env.REQUEST_LOG_BODY_MAX_SIZE ?? "1024",
    10,
  ),
}));
