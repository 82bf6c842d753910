import winston from 'winston';
import { getLogLevel } from '../config/index.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const componentStr = component ? `[${String(component)}]` : '';
  const metaStr = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `${String(timestamp)} ${level} ${componentStr} ${String(message)}${metaStr}`;
});

// Create the base logger
function createLogger(): winston.Logger {
  return winston.createLogger({
    level: getLogLevel(),
    format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
    transports: [
      new winston.transports.Console({
        format: combine(colorize({ all: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
      }),
    ],
    // Don't exit on handled exceptions
    exitOnError: false,
  });
}

// Singleton logger instance
let loggerInstance: winston.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

/**
 * Create a child logger with a component name
 */
export function createComponentLogger(component: string): winston.Logger {
  return getLogger().child({ component });
}

/**
 * Logger interface for type safety
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Wrapper class that implements the Logger interface
 */
export class ComponentLogger implements Logger {
  private logger: winston.Logger;

  constructor(component: string) {
    this.logger = getLogger().child({ component });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }
}

/**
 * Create a typed logger for a component
 */
export function logger(component: string): Logger {
  return new ComponentLogger(component);
}
