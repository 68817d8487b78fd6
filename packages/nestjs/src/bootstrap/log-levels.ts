import type { LogLevel } from "@nestjs/common";

import {
  APP_LOG_LEVELS,
  type AppLogLevel,
} from "../modules/config-management";

const isAppLogLevel = (value: string | undefined): value is AppLogLevel =>
  APP_LOG_LEVELS.some((level) => level === value);

/**
 * Every level up to and including the configured one, e.g. "log" enables
 * error, warn and log.
 */
export function resolveLogLevels(configured: string | undefined): LogLevel[] {
  const level = isAppLogLevel(configured) ? configured : "log";
  return APP_LOG_LEVELS.slice(0, APP_LOG_LEVELS.indexOf(level) + 1);
}
