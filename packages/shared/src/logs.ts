import pino from "pino";
import * as promClient from "prom-client";
import { variables } from "./environment";

// Define log levels and namespaces
const namespaces = ["codec", "archive", "cli"] as const;
const logLevels = ["info", "warn", "debug", "error"] as const;

type Namespace = (typeof namespaces)[number];
type LogLevel = (typeof logLevels)[number];
type LogMeta = Record<string, unknown>;
type LogFn = (message: string, meta?: LogMeta, error?: Error) => void;

// Own registry so repeated module evaluation never collides on metric names
const logRegistry = new promClient.Registry();

const logCounter = new promClient.Counter({
  name: "log_messages_total",
  help: "Total number of log messages by namespace and level",
  labelNames: ["namespace", "level"] as const,
  registers: [logRegistry],
});

const errorLogCounter = new promClient.Counter({
  name: "log_errors_total",
  help: "Total number of error logs by namespace",
  labelNames: ["namespace", "error_type"] as const,
  registers: [logRegistry],
});

const isDevelopment = variables.NODE_ENV === "development";

// Logs go to stderr; stdout carries the CLI's own output
const pinoLogger = pino(
  {
    level: variables.LOG_LEVEL ?? (isDevelopment ? "debug" : "info"),
    transport: isDevelopment
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  },
  isDevelopment ? undefined : pino.destination({ dest: 2, sync: true })
);

function recordLogMetrics(
  namespace: Namespace,
  level: LogLevel,
  error?: Error
): void {
  logCounter.labels(namespace, level).inc();

  if (level === "error" && error) {
    const errorType = error.name || error.constructor.name || "UnknownError";
    errorLogCounter.labels(namespace, errorType).inc();
  }
}

function createLogger(namespace: Namespace, level: LogLevel): LogFn {
  return (message, meta, error) => {
    recordLogMetrics(namespace, level, error);

    const logObj: LogMeta = {
      namespace,
      ...meta,
    };

    if (error) {
      logObj.error = {
        message: error.message,
        stack: error.stack,
        name: error.name,
      };
    }

    switch (level) {
      case "info":
        pinoLogger.info(logObj, message);
        break;
      case "warn":
        pinoLogger.warn(logObj, message);
        break;
      case "debug":
        pinoLogger.debug(logObj, message);
        break;
      case "error":
        pinoLogger.error(logObj, message);
        break;
    }
  };
}

function initializeLoggers(): {
  [K in Namespace]: { [L in LogLevel]: LogFn };
} {
  const forNamespace = (namespace: Namespace) => ({
    info: createLogger(namespace, "info"),
    warn: createLogger(namespace, "warn"),
    debug: createLogger(namespace, "debug"),
    error: createLogger(namespace, "error"),
  });

  return {
    codec: forNamespace("codec"),
    archive: forNamespace("archive"),
    cli: forNamespace("cli"),
  };
}

export const logger = initializeLoggers();

/**
 * Structured logging with automatic Prometheus metrics
 */
export class StructuredLogger {
  constructor(private namespace: Namespace) {}

  info(message: string, meta?: LogMeta) {
    logger[this.namespace].info(message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    logger[this.namespace].warn(message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    logger[this.namespace].debug(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta) {
    logger[this.namespace].error(message, meta, error);
  }

  /**
   * Log with automatic timing and metrics
   */
  async timed<T>(
    operation: string,
    fn: () => Promise<T>,
    meta?: LogMeta
  ): Promise<T> {
    const startTime = performance.now();
    this.debug(`Starting ${operation}`, meta);

    try {
      const result = await fn();
      const duration = performance.now() - startTime;
      this.info(`Completed ${operation}`, {
        ...meta,
        duration: `${duration.toFixed(2)}ms`,
      });
      return result;
    } catch (error) {
      const duration = performance.now() - startTime;
      this.error(
        `Failed ${operation}`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...meta,
          duration: `${duration.toFixed(2)}ms`,
        }
      );
      throw error;
    }
  }
}

export function createStructuredLogger(namespace: Namespace): StructuredLogger {
  return new StructuredLogger(namespace);
}

/**
 * Get current log metrics for monitoring
 */
export function getLogMetrics() {
  return {
    registry: logRegistry,
    totalLogs: logCounter,
    errorLogs: errorLogCounter,
  };
}

export type { Namespace, LogLevel, LogMeta };
