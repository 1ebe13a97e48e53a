/**
 * Logger Factory
 *
 * Selection Logic:
 * - LOGGER_TYPE=cloudwatch → CloudWatch-flavoured JSON
 * - LOGGER_TYPE=console or unset → console (pretty in development)
 */

import { env } from '@/config/env';
import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { LogFormat, PinoLogger, createPinoInstance } from './PinoLogger';

export class LoggerFactory implements ILoggerFactory {
  constructor(private readonly format: LogFormat) {}

  createLogger(context: string = 'app'): PinoLogger {
    return new PinoLogger(createPinoInstance(context, this.format));
  }
}

const factory = new LoggerFactory(env.LOGGER_TYPE === 'cloudwatch' ? 'cloudwatch' : 'console');

/**
 * Default logger instance for application use
 */
const appLogger = factory.createLogger('app');
export const logger: ILogger = appLogger;

/**
 * Raw pino instance behind the default logger, for pino-http
 */
export const pinoInstance = appLogger.instance;

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
