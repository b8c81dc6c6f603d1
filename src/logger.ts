import { pino } from 'pino';

export const logger = pino({
  name: 'mesh-forge',
  level: process.env.LOG_LEVEL ?? 'info',
});
