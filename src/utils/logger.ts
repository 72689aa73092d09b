import pino from 'pino';
import { runtime } from '../config/index.js';

export const logger = pino({
  level: runtime.logLevel,
  transport:
    runtime.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export const enableDebugLogging = (): void => {
  logger.level = 'debug';
};
