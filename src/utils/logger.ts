import pino from 'pino';

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
    : undefined,
  base: { service: 'voice-bridge' },
});

export type Logger = pino.Logger;

export function createCallLogger(connectionId: string): Logger {
  return logger.child({ connectionId });
}

export default logger;
