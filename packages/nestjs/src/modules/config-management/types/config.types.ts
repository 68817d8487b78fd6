export enum NodeEnv {
  PRODUCTION = "production",
  DEVELOPMENT = "development",
  TEST = "test",
}

export enum CheckpointStoreDriver {
  SQLITE = "sqlite",
  MEMORY = "memory",
}

export const APP_LOG_LEVELS = [
  "error",
  "warn",
  "log",
  "debug",
  "verbose",
] as const;

export type AppLogLevel = (typeof APP_LOG_LEVELS)[number];

export interface CheckpointStorageConfig {
  driver: CheckpointStoreDriver;
  connectionString: string;
  pageSize: number;
}
