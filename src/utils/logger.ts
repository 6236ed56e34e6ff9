/**
 * Centralized Winston logger
 */

import winston from 'winston';
import path from 'node:path';

// Log levels configuration
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
// Optional JSON log file, relative to the working directory
const LOG_FILE = process.env.LOG_FILE;

export const logger = winston.createLogger({
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
  },
  level: LOG_LEVEL,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports: [
    // Console transport with colorized output
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          let msg = `[${String(timestamp)}] ${level}: ${String(message)}`;
          if (Object.keys(meta).length > 0) {
            msg += ` ${JSON.stringify(meta)}`;
          }
          return msg;
        }),
      ),
    }),
    ...(LOG_FILE
      ? [
          // File transport with JSON format
          new winston.transports.File({
            filename: path.resolve(process.cwd(), LOG_FILE),
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
            maxsize: 10485760, // 10MB
            maxFiles: 5,
          }),
        ]
      : []),
  ],
});

export default logger;
