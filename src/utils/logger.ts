import pino from 'pino';

const level = process.env.SETTLE_LOG_LEVEL ?? 'info';
const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

export const logger = pino({
  level,
  ...(isDev && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  }),
});
