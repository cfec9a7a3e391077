import pino from 'pino';
import { config } from '../config';

const isProduction = config.nodeEnv === 'production';
const isTest = config.nodeEnv === 'test';

const pinoLogger = pino({
  level: config.logLevel,
  ...(isProduction || isTest
    ? {
        // Production: structured JSON logging
        formatters: {
          level: (label: string) => {
            return { level: label };
          },
        },
      }
    : {
        // Development: pretty printed logs
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      }),
});

type LogMeta = Record<string, unknown>;

const logger = {
  info: (message: string, meta?: LogMeta) => {
    if (meta) {
      pinoLogger.info(meta, message);
    } else {
      pinoLogger.info(message);
    }
  },
  error: (message: string, meta?: LogMeta) => {
    if (meta) {
      pinoLogger.error(meta, message);
    } else {
      pinoLogger.error(message);
    }
  },
  warn: (message: string, meta?: LogMeta) => {
    if (meta) {
      pinoLogger.warn(meta, message);
    } else {
      pinoLogger.warn(message);
    }
  },
  debug: (message: string, meta?: LogMeta) => {
    if (meta) {
      pinoLogger.debug(meta, message);
    } else {
      pinoLogger.debug(message);
    }
  },
};

export const errorMeta = (error: unknown): LogMeta => ({
  error: error instanceof Error ? error.message : 'Unknown error',
  stack: error instanceof Error ? error.stack : undefined,
});

export { pinoLogger };
export default logger;
