import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  level: config.logging.level,
  base: { service: 'guardian-extract' },
  ...(config.isDevelopment
    ? { transport: { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } } }
    : {}),
});

export type Logger = typeof logger;
