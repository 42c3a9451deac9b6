import pino, { type Logger } from 'pino';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Level for the root logger. The logger is built before configuration
 * loads, so an unknown value falls back to info instead of throwing.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

const isDevelopment = process.env.NODE_ENV === 'development';

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname,service' },
      }
    : undefined,
  base: { service: 'league-price-resolver' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: { err: pino.stdSerializers.err },
});

/** Child logger tagged with the module that writes through it. */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}

/** Apply the configured level once configuration has been parsed. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export type { Logger };
