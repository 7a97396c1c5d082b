import pino from 'pino';
import { env } from './config.js';

export type Logger = pino.Logger;

/** One named pino logger per module, sharing the configured level. */
export function createLogger(name: string): Logger {
  return pino({ name, level: env.LOG_LEVEL });
}
