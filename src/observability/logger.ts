import pino from 'pino';
import { env } from '../config/env';

export const SERVICE_NAME = 'ticket-allocator';

export interface LoggerSettings {
  level: string;
  nodeEnv: string;
}

/**
 * JSON lines with ISO timestamps and every line tagged with the service name.
 * In development the output goes through the pino/file transport to stdout.
 */
export function loggerOptions({ level, nodeEnv }: LoggerSettings): pino.LoggerOptions {
  return {
    level,
    base: { service: SERVICE_NAME },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
    ...(nodeEnv === 'development'
      ? { transport: { target: 'pino/file', options: { destination: 1 } } }
      : {}),
  };
}

export const logger = pino(loggerOptions({ level: env.logLevel, nodeEnv: env.nodeEnv }));

/** Create a child logger bound to one allocation run */
export function childLogger(runId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ runId, ...extra });
}
