import pino from "pino";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const isDev = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Production: JSON format for log aggregation
 *
 * Both write to stderr; stdout carries command output only.
 */
const baseLogger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    transport: isDev
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined,
    formatters: isDev
      ? undefined
      : {
          level: (label) => ({ level: label }),
        },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  isDev ? undefined : pino.destination(2),
);

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

/**
 * Create a run-scoped logger for a single export.
 */
export function createRunLogger(runId: string): pino.Logger {
  return createLogger({ component: "export", correlationId: runId });
}

export { baseLogger as logger };

export type { Logger } from "pino";
