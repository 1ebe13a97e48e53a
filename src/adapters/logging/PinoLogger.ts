/**
 * Pino Logger Adapter
 *
 * Two output flavours over the same pino core:
 * - console: pino-pretty in development, plain JSON otherwise
 * - cloudwatch: JSON with upper-case levels and deployment metadata on every line,
 *   ready for CloudWatch Logs Insights when stdout is shipped by the agent
 */

import pino from 'pino';
import { env } from '@/config/env';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

export type LogFormat = 'console' | 'cloudwatch';

export function createPinoInstance(context: string, format: LogFormat): pino.Logger {
  if (format === 'cloudwatch') {
    return pino({
      name: context,
      level: env.LOG_LEVEL,
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
      base: {
        env: env.NODE_ENV,
        region: env.AWS_REGION,
        service: 'asset-valuation-api',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  return pino({
    name: context,
    level: env.LOG_LEVEL,
    transport:
      env.NODE_ENV === 'development' && env.LOG_PRETTY
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export class PinoLogger implements ILogger {
  constructor(private readonly logger: pino.Logger) {}

  /**
   * Underlying pino instance (pino-http needs the real thing)
   */
  get instance(): pino.Logger {
    return this.logger;
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('debug', messageOrMetadata, message);
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('info', messageOrMetadata, message);
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('warn', messageOrMetadata, message);
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('error', messageOrMetadata, message);
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('fatal', messageOrMetadata, message);
  }

  private write(level: pino.Level, messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger[level](messageOrMetadata);
    } else {
      this.logger[level](messageOrMetadata, message);
    }
  }
}
