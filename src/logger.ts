/**
 * Logger module - structured logging with optional file rotation
 */

import pino from 'pino';
import * as path from 'path';

// LOG_DIR switches output from stdout to a rotated file
const logDir = process.env.LOG_DIR;

// Tests stay quiet unless LOG_LEVEL asks otherwise
const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

const options: pino.LoggerOptions = {
  level,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
};

export const logger = logDir
  ? pino(
      options,
      pino.transport({
        target: 'pino-roll',
        options: {
          file: path.join(logDir, 'mirror.log'),
          size: process.env.LOG_MAX_SIZE || '100m',
          limit: { count: parseInt(process.env.LOG_MAX_FILES || '7', 10) },
          frequency: process.env.LOG_FREQUENCY || 'daily',
          mkdir: true,
        },
      })
    )
  : pino(options);

export type Logger = pino.Logger;

// Create child loggers for different modules
export const createLogger = (name: string): Logger => {
  return logger.child({ module: name });
};

export default logger;
