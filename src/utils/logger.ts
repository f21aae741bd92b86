import winston from "winston";
import { causeOf } from "./errors";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, ...meta }) => {
  return `${timestamp} ${level}: ${message} ${
    Object.keys(meta).length ? JSON.stringify(meta, errorReplacer) : ""
  }`;
});

// Error instances serialize to {} by default; causes are nested
export function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const cause = causeOf(value);
    return cause === undefined
      ? { name: value.name, message: value.message }
      : { name: value.name, message: value.message, cause };
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

export interface LoggerOptions {
  level: string;
  file?: string;
}

/**
 * Console logger by default; a file logger when a path is given.
 * Uncaught exceptions go to the same transport.
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transport:
    | winston.transports.FileTransportInstance
    | winston.transports.ConsoleTransportInstance = options.file
    ? new winston.transports.File({
        filename: options.file,
        format: combine(timestamp(), logFormat),
      })
    : new winston.transports.Console({
        format: combine(colorize(), timestamp(), logFormat),
      });

  const logger = winston.createLogger({
    level: options.level,
    format: combine(timestamp(), logFormat),
    transports: [transport],
  });

  logger.exceptions.handle(transport);

  return logger;
}
