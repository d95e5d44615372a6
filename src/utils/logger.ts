// src/utils/logger.ts
import * as winston from 'winston';
import { z } from 'zod';
import { ConfigurableLogger, createLogger } from './configurable-logger';
import { LoggingConfig } from '../types/config.types';
import { loggingConfigSchema } from '../config/config-schema';

// Check if we have a logging config from the environment
let loggingConfig: LoggingConfig | undefined;

if (process.env.LOGGING_CONFIG) {
  try {
    loggingConfig = loggingConfigSchema.parse(JSON.parse(process.env.LOGGING_CONFIG));
  } catch (e) {
    const reason = e instanceof z.ZodError ? e.issues.map(issue => issue.message).join('; ') : String(e);
    console.warn(`Failed to parse LOGGING_CONFIG from environment: ${reason}`);
  }
}

let logger: winston.Logger;

if (loggingConfig) {
  logger = createLogger(loggingConfig);
} else {
  // Console only until a CLI initializes file logging
  logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss'
      }),
      winston.format.errors({ stack: true }),
      winston.format.simple()
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, timestamp }) => {
            return `${timestamp} [${level}]: ${message}`;
          })
        )
      })
    ]
  });
}

export default logger;
export { logger };

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;
  static globalConfig: LoggingConfig | undefined;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Initialize logger with configuration
   * Call this at application startup with your config
   */
  static initialize(config: LoggingConfig): void {
    Logger.globalConfig = config;
    const newLogger = createLogger(config);

    // Swap the transports on the shared instance so existing imports see them
    logger.clear();
    newLogger.transports.forEach(transport => {
      logger.add(transport);
    });

    logger.level = newLogger.level;
    logger.format = newLogger.format;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      logger.error(`[${this.context}] ${message}: ${error}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }

  setLevel(level: string): void {
    logger.level = level;
  }
}

export function getLogFilePaths(): ReturnType<typeof ConfigurableLogger.getLogFilePaths> | null {
  if (Logger.globalConfig) {
    return ConfigurableLogger.getLogFilePaths();
  }
  return null;
}
