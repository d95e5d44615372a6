// src/utils/log-config-loader.ts
import * as fs from 'fs-extra';
import * as path from 'path';
import { LoggingConfig } from '../types/config.types';
import { loggingConfigSchema } from '../config/config-schema';
import { Logger } from './logger';

/**
 * Load logging configuration from config/log-config.json.
 * Falls back to the configuration passed in if the file is absent or invalid.
 */
export function loadLoggingConfig(
  fallbackConfig?: LoggingConfig,
  logConfigPath: string = path.join(process.cwd(), 'config', 'log-config.json')
): LoggingConfig | undefined {
  try {
    if (fs.existsSync(logConfigPath)) {
      const configContent = fs.readFileSync(logConfigPath, 'utf-8');
      return loggingConfigSchema.parse(JSON.parse(configContent));
    }
  } catch (error) {
    console.warn(`Failed to load ${logConfigPath}: ${error}`);
  }

  return fallbackConfig;
}

/**
 * Initialize logger with centralized config or fallback.
 * Call this at the start of any CLI command.
 */
export function initializeLogger(fallbackConfig?: LoggingConfig): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig);

    const logger = new Logger('LogConfigLoader');
    logger.debug(`Initialized logger with profile: ${loggingConfig.profile || 'default'}`);
  }
}
