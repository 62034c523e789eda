import pino from 'pino';
import { parseLogLevel } from '../config.js';

const env = process.env.NODE_ENV ?? 'development';

export const logger = pino({
  level: parseLogLevel(process.env),
  transport:
    env === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

// Child loggers for modules
export const createLogger = (module: string) => logger.child({ module });

export const httpLogger = createLogger('http');
export const dbLogger = createLogger('db');
export const authLogger = createLogger('auth');
export const usersLogger = createLogger('users');
