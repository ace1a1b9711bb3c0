import { destination, pino, type LoggerOptions } from 'pino';

import { env } from '../config/index.js';

// stdout carries the per-file report lines, so diagnostics go to stderr.
const STDERR = 2;

const options: LoggerOptions = {
  level: env.LOG_LEVEL,
  base: {
    app: 'photo-album-tools',
    env: env.NODE_ENV
  }
};

export const logger = env.isDevelopment
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: true,
          destination: STDERR
        }
      }
    })
  : pino(options, destination(STDERR));
