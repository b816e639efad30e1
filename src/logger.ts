// src/logger.ts
/**
 * Logger module.
 *
 * Features:
 *  - Console logging with a human-friendly format.
 *  - Optional file logging via `winston-daily-rotate-file` (enable with LOG_TO_FILE=true).
 *  - Log retention (TTL) via `maxFiles` on the rotate transport.
 *  - stream for morgan integration.
 *
 * Env vars (see .env.example):
 *  - LOGGING_ENABLED (true|false)   -> silence everything when false (tests run this way)
 *  - LOG_TO_FILE      (true|false)  -> enable file transport
 *  - LOG_TTL_DAYS     (number)      -> number of days to keep old logs (default 30)
 *  - LOG_LEVEL        (info|debug|warn|error) -> default log level
 *  - LOG_DIR                          -> where rotated files are written
 */

import fs from "fs";
import path from "path";
import { createLogger, format, transports } from "winston";
import type Transport from "winston-transport";
import DailyRotateFile from "winston-daily-rotate-file";
import { config, type LogConfig } from "./config";

const { combine, timestamp, printf, errors, json } = format;

// Human-friendly console formatter
const consoleFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level}: ${stack || message}${metaStr}`;
});

// JSON format for files
const fileFormat = combine(timestamp(), errors({ stack: true }), json());

function fileTransport(log: LogConfig): Transport {
  fs.mkdirSync(log.dir, { recursive: true });
  return new DailyRotateFile({
    filename: path.join(log.dir, "app-%DATE%.log"),
    datePattern: "YYYY-MM-DD",
    zippedArchive: true,
    maxFiles: `${log.ttlDays}d`, // e.g. '30d' => keep 30 days
    level: log.level,
    format: fileFormat,
  });
}

export function buildLogger(log: LogConfig) {
  const transportsList: Transport[] = [
    new transports.Console({
      level: log.level,
      format: combine(timestamp(), errors({ stack: true }), consoleFormat),
    }),
  ];

  if (log.enabled && log.toFile) {
    transportsList.push(fileTransport(log));
  }

  return createLogger({
    level: log.level,
    transports: transportsList,
    silent: !log.enabled,
    exitOnError: false,
  });
}

const logger = buildLogger(config.log);

/**
 * stream for morgan (HTTP request logger)
 */
export const stream = {
  write: (message: string) => {
    // morgan includes newline at end
    logger.info(message.trim());
  },
};

export { logger };
