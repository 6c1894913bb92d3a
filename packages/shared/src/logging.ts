import pino from "pino";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const nodeEnv = process.env.NODE_ENV;
const isDev = nodeEnv === "development";

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return nodeEnv === "test" ? "silent" : "info";
}

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Everything else: JSON lines for log aggregation
 */
const baseLogger = pino({
  level: defaultLevel(),
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

export { baseLogger as logger };

export type { Logger } from "pino";
