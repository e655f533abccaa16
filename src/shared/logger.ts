import pino from 'pino';
import { config } from './config';

function createLogger(): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.isTest ? 'silent' : config.log.level,
    serializers: pino.stdSerializers,
    base: { service: 'tenant-auth-core' },
  };

  return pino(opts);
}

export const logger = createLogger();

export type Logger = pino.Logger;

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
