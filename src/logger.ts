// Pino writes structured JSON logs; LOG_LEVEL=silent turns it off entirely.
import pino from 'pino';
import { env } from './config';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'session-shop-api' },
});
