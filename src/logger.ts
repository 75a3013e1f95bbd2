/**
 * Root logger. JSON lines on stderr so stdout stays free for command output.
 */
import { pino, stdTimeFunctions } from "pino";
import type { Logger, LoggerOptions } from "pino";

export const loggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
});

export function createLogger(level = "info"): Logger {
  return pino(loggerOptions(level), process.stderr);
}
