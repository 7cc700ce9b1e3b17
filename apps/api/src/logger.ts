import { pino } from "pino";
import type { Logger as PinoLogger, LevelWithSilent } from "pino";

export type Logger = PinoLogger;

export interface LoggerOptions {
  name: string;
  level: LevelWithSilent;
}

/** Options handed to Fastify, which builds its own pino instance from them. */
export function loggerOptions(level: LevelWithSilent = "info", name = "rankguard"): LoggerOptions {
  return { name, level };
}

/** Standalone logger for code that runs before the server exists. */
export function createLogger(level: LevelWithSilent = "info", name?: string): Logger {
  return pino(loggerOptions(level, name));
}
