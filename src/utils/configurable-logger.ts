// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs-extra';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

// Default logging profiles
const DEFAULT_PROFILES: Record<string, LoggingProfile> = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  }
};

export interface LogFilePaths {
  combined: string;
  error: string;
  warning?: string;
}

const lineFormat = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export class ConfigurableLogger {
  private static config: LoggingProfile | null = null;
  private static startedAt: Date = new Date();

  /**
   * Build a winston logger for the resolved profile. File transports go to the
   * profile's log directory; if it cannot be created, console only.
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const effectiveConfig = this.resolveConfig(config);
    this.config = effectiveConfig;
    this.startedAt = new Date();

    const logger = winston.createLogger({
      level: effectiveConfig.logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), lineFormat)
        })
      ]
    });

    const logsDir = path.join(process.cwd(), effectiveConfig.logDirectory);
    try {
      fs.ensureDirSync(logsDir);
    } catch (error) {
      logger.warn(`Could not create logs directory ${logsDir}, using console only`);
      return logger;
    }

    const files = this.getLogFilePaths();

    // Combined log (all levels)
    logger.add(new winston.transports.File({ filename: files.combined, format: lineFormat }));

    logger.add(new winston.transports.File({
      filename: files.error,
      level: 'error',
      format: winston.format.printf(({ level, message, timestamp, stack }) => {
        return `${timestamp} [${level}]: ${message}${typeof stack === 'string' ? '\n' + stack : ''}`;
      })
    }));

    if (files.warning) {
      logger.add(new winston.transports.File({ filename: files.warning, level: 'warn', format: lineFormat }));
    }

    return logger;
  }

  /**
   * Resolve the effective logging profile
   */
  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.profile) {
      const custom = config.profiles?.[config.profile];
      if (custom) return custom;

      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) return builtIn;

      console.warn(`Logging profile '${config.profile}' not found, using AppendDatetime`);
      return DEFAULT_PROFILES.AppendDatetime;
    }

    // Direct configuration
    if (config.appendTimestamp !== undefined) {
      return {
        appendTimestamp: config.appendTimestamp,
        timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
        logLevel: config.logLevel || 'info',
        enableWarningLog: config.enableWarningLog !== false,
        logDirectory: config.logDirectory || 'logs'
      };
    }

    return DEFAULT_PROFILES.AppendDatetime;
  }

  /**
   * Log file name for a profile, with the run's start time appended when the
   * profile asks for it
   */
  static generateLogFilename(baseName: string, config: LoggingProfile, now: Date = this.startedAt): string {
    if (!config.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;
    if (config.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const year = now.getFullYear();
      const month = String(now.getMonth() + 1).padStart(2, '0');
      const day = String(now.getDate()).padStart(2, '0');
      const hours = String(now.getHours()).padStart(2, '0');
      const minutes = String(now.getMinutes()).padStart(2, '0');
      const seconds = String(now.getSeconds()).padStart(2, '0');
      timestamp = `${year}-${month}-${day}-${hours}${minutes}${seconds}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);
    return `${name}-${timestamp}${ext}`;
  }

  /**
   * Full paths of the log files the current profile writes to
   */
  static getLogFilePaths(): LogFilePaths {
    const config = this.config ?? this.resolveConfig();
    const logsDir = path.join(process.cwd(), config.logDirectory);

    const result: LogFilePaths = {
      combined: path.join(logsDir, this.generateLogFilename('combined.log', config)),
      error: path.join(logsDir, this.generateLogFilename('error.log', config))
    };
    if (config.enableWarningLog) {
      result.warning = path.join(logsDir, this.generateLogFilename('warning.log', config));
    }
    return result;
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
