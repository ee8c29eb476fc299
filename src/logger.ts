/**
 * wireline - Logging
 */

import winston from "winston";

export interface LoggerOptions {
  level?: "error" | "warn" | "info" | "debug";
  silent?: boolean;
}

const lineFormat = winston.format.printf(
  ({ level, message, timestamp, service, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${extra}`;
  }
);

/**
 * Create a console logger with the package's format
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const { level = "warn", silent = false } = options;

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.errors({ stack: true }),
      lineFormat
    ),
    defaultMeta: { service: "wireline" },
    transports: [new winston.transports.Console()],
  });
}

/** Logger used when a Transceiver is not given one */
export const logger = createLogger();
