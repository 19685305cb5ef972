import { pino } from 'pino';
export type { Logger } from 'pino';

const pretty = process.env.LOG_PRETTY === '1';
const level = process.env.LOG_LEVEL || 'info';

export const logger = pino(
  pretty
    ? { level, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : { level }
);
