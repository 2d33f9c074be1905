import pino from 'pino';
import { env } from './env';

function resolveLevel(): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  level: resolveLevel(),
  base: { service: 'zip-image-optimizer' },
  ...(env.NODE_ENV === 'development'
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss' }
        }
      }
    : {})
});

export type Logger = typeof logger;
