import pino from 'pino';

const level = process.env.NODE_ENV === 'test' ? 'silent' : process.env.LOG_LEVEL || 'info';

export const logger = pino({
  name: 'portfolio-assistant',
  level,
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: ['req.headers.authorization', 'req.headers.cookie']
});

export type Logger = pino.Logger;

export function createLogger(bindings: { service: string } & Record<string, unknown>): Logger {
  return logger.child(bindings);
}
