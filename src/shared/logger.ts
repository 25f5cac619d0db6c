import pino from 'pino';
import type { LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const logFile = process.env['LOG_FILE'];

const options: LoggerOptions = {
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    !logFile && env !== 'production' && env !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
};

// The scheduler is usually left running unattended; LOG_FILE keeps its history on disk.
export const logger = logFile
  ? pino(options, pino.destination({ dest: logFile, mkdir: true, sync: false }))
  : pino(options);
