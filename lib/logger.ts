import pino from 'pino';

export type { Logger } from 'pino';

export const log = pino({
  name: 'rivalscope',
  level: process.env.LOG_LEVEL ?? 'info',
  base: null,
  timestamp: pino.stdTimeFunctions.isoTime,
});
