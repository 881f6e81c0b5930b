import pino from 'pino';

const level = process.env.DISPATCH_LOG_LEVEL ?? 'info';
const pretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test' && level !== 'silent';

export const logger = pino({
  name: 'module-dispatch',
  level,
  ...(pretty && {
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
