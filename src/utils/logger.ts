import winston from 'winston';
import fs from 'fs';
import { config } from './config.js';

if (!fs.existsSync(config.paths.dataDir)) {
  fs.mkdirSync(config.paths.dataDir, { recursive: true });
}

const consoleLevel = process.env.SCHOOL_LOG_LEVEL;

// Failures are reported to the user by exitWithError; the console transport
// only runs when SCHOOL_LOG_LEVEL asks for it, and then writes to stderr
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
  ),
  transports: [
    new winston.transports.Console({
      level: consoleLevel ?? 'warn',
      silent: consoleLevel === undefined,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message }) => {
          return `${timestamp} [${level}]: ${message}`;
        })
      ),
    }),
    new winston.transports.File({
      filename: config.paths.log,
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
    }),
  ],
});
