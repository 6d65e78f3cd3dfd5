// Shared pino logger
// Same pretty-printing setup as the Fastify server logger

import { pino } from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  ...(level === 'silent'
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
});

export type Logger = typeof logger;
