export enum NodeEnv {
  PRODUCTION = "production",
  DEVELOPMENT = "development",
  TEST = "test",
}

export enum LogFormat {
  TEXT = "text",
  JSON = "json",
}

export const LOG_LEVELS = [
  "verbose",
  "debug",
  "log",
  "warn",
  "error",
  "fatal",
] as const;

export type AppLogLevel = (typeof LOG_LEVELS)[number];

export enum CheckpointStoreBackend {
  MEMORY = "memory",
  POSTGRES = "postgres",
}
