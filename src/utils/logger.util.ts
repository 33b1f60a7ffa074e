import pino from "pino";
import type { Logger as PinoLogger } from "pino";
import { loadConversionConfig, type LogLevel } from "./env.util";

let rootLogger: PinoLogger | undefined;

function getRootLogger(): PinoLogger {
  if (!rootLogger) {
    const { logLevel, loggingAppName } = loadConversionConfig();
    rootLogger = pino({
      level: logLevel,
      base: { service: loggingAppName },
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return rootLogger;
}

/**
 * Changes the level of every logger, including ones already created
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

// The application name is bound once on the root logger from LOGGING_APP_NAME
export interface LoggerOptions {
  context: string;
}

export class Logger {
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions) {
    this.options = options;
  }

  // Children are created per call so level changes on the root apply immediately
  private child(): PinoLogger {
    return getRootLogger().child({ context: this.options.context });
  }

  debug(message: string, details?: unknown): void {
    if (!getRootLogger().isLevelEnabled("debug")) {
      return;
    }
    this.child().debug(toBindings(details), message);
  }

  info(message: string, details?: unknown): void {
    this.child().info(toBindings(details), message);
  }

  warn(message: string, details?: unknown): void {
    this.child().warn(toBindings(details), message);
  }

  error(message: string, details?: unknown): void {
    this.child().error(toBindings(details), message);
  }
}

function toBindings(details: unknown): Record<string, unknown> {
  if (details === undefined) {
    return {};
  }
  if (details instanceof Error) {
    return { err: details };
  }
  if (typeof details === "object" && details !== null && !Array.isArray(details)) {
    return { ...details };
  }
  return { details };
}
