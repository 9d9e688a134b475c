import { pino } from 'pino';

export interface LogMethod {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

// Structural subset of pino's logger; Fastify's `app.log` satisfies it too.
export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({ name, level });
}

export const silentLogger: Logger = pino({ level: 'silent' });
