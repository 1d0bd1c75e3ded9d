import winston from 'winston';
import path from 'path';
import fs from 'fs';
import config from '../config/index.js';

export const SERVICE_NAME = 'career-pathfinder';

/** Fields every entry carries that the console line shows in its prefix instead of the meta. */
const PREFIX_FIELDS = new Set(['timestamp', 'level', 'message', 'service', 'component']);

export interface LogLine {
  [key: string]: unknown;
  level: string;
  message: unknown;
}

/**
 * `2026-03-01 08:30:00 [info] http: GET /api/recommend 200 {"durationMs":4}`.
 * The component tag is left out for entries logged on the root logger.
 */
export function formatConsoleLine(info: LogLine): string {
  const tag = typeof info.component === 'string' ? ` ${info.component}:` : ':';
  const meta = Object.fromEntries(Object.entries(info).filter(([key]) => !PREFIX_FIELDS.has(key)));
  const timestamp = typeof info.timestamp === 'string' ? `${info.timestamp} ` : '';
  let line = `${timestamp}[${info.level}]${tag} ${String(info.message)}`;
  if (Object.keys(meta).length > 0) {
    line += ` ${JSON.stringify(meta)}`;
  }
  return line;
}

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => formatConsoleLine(info))
);

const transports: winston.transport[] = [];

// File transport, JSON lines for log shipping
if (config.logging.file && !config.logging.silent) {
  const logDir = path.dirname(config.logging.file);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: config.logging.file,
      format: fileFormat,
      maxsize: config.logging.maxBytes,
      maxFiles: config.logging.maxFiles,
      tailable: true,
    })
  );
}

// Console transport. Always present so a silenced logger still has a sink.
transports.push(
  new winston.transports.Console({
    format: consoleFormat,
    silent: !config.logging.stderr,
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: { service: SERVICE_NAME },
  transports,
  silent: config.logging.silent,
  exitOnError: false,
});

/** Logger tagged with the part of the engine writing the entry (`http`, `reference-data`). */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export default logger;
