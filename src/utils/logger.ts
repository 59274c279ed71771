import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  level: config.server.nodeEnv === 'test' ? 'silent' : config.server.logLevel,
  transport:
    config.server.nodeEnv === 'development'
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
