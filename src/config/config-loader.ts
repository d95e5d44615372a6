// src/config/config-loader.ts
import * as fs from 'fs-extra';
import { z } from 'zod';
import { ConsolidatorConfig } from '../types/config.types';
import { AnchorSpec } from '../types/report.types';
import { ConfigurationError } from '../errors/ConsolidationError';
import { validateOffsetTable } from '../utils/offsets';
import { consolidatorConfigFileSchema, ConsolidatorConfigFile } from './config-schema';
import { defaultConfig } from './defaults';

export interface ConfigOverrides {
  configPath?: string;
  reportsDir?: string;
  outputFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Read and validate a JSON configuration file
 */
export function readConfigFile(configPath: string): ConsolidatorConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration ${configPath}`, [String(error)], configPath);
  }

  try {
    return consolidatorConfigFileSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration ${configPath}`, issues, configPath);
    }
    throw error;
  }
}

/**
 * Layer a configuration file over the defaults
 */
export function mergeConfig(base: ConsolidatorConfig, file: ConsolidatorConfigFile): ConsolidatorConfig {
  return {
    ...base,
    ...file,
    markers: { ...base.markers, ...file.markers },
    offsets: { ...base.offsets, ...file.offsets }
  };
}

/**
 * Problems that make a configuration unusable, empty when it is valid
 */
export function validateConfig(config: ConsolidatorConfig): string[] {
  const issues: string[] = [];

  if (config.anchorPhrases.length === 0) {
    issues.push('anchorPhrases must not be empty');
  }
  if (config.columnHeadings.length !== config.anchorPhrases.length) {
    issues.push(
      `columnHeadings has ${config.columnHeadings.length} entries but anchorPhrases has ${config.anchorPhrases.length}`
    );
  }
  const duplicates = config.anchorPhrases.filter((phrase, i) => config.anchorPhrases.indexOf(phrase) !== i);
  if (duplicates.length > 0) {
    issues.push(`anchorPhrases contains duplicates: ${duplicates.join(', ')}`);
  }

  if (!Number.isInteger(config.cyclesPerBillingMonth) || config.cyclesPerBillingMonth < 1) {
    issues.push('cyclesPerBillingMonth must be a positive integer');
  }

  issues.push(...validateOffsetTable(config.offsets));

  if (config.monthAbbreviations.length !== 12) {
    issues.push(`monthAbbreviations must have 12 entries, found ${config.monthAbbreviations.length}`);
  }
  const { start, end } = config.offsets.scheduleMonth;
  if (end !== undefined) {
    const width = end - start;
    const misfit = config.monthAbbreviations.filter(abbreviation => abbreviation.length !== width);
    if (misfit.length > 0) {
      issues.push(`monthAbbreviations must be ${width} characters to fit offsets.scheduleMonth: ${misfit.join(', ')}`);
    }
  }

  if (!config.markers.readCycle || !config.markers.scheduleDates) {
    issues.push('markers.readCycle and markers.scheduleDates must not be empty');
  }

  return issues;
}

/**
 * Resolve the run configuration. Precedence for the reports folder and the
 * output file: explicit override, then REPORTS_DIR / OUTPUT_FILE, then the
 * config file, then the defaults.
 */
export function loadConsolidatorConfig(overrides: ConfigOverrides = {}): ConsolidatorConfig {
  const env = overrides.env ?? process.env;

  let config = defaultConfig;
  if (overrides.configPath) {
    config = mergeConfig(config, readConfigFile(overrides.configPath));
  }

  config = {
    ...config,
    reportsDir: overrides.reportsDir || env.REPORTS_DIR || config.reportsDir,
    outputFile: overrides.outputFile || env.OUTPUT_FILE || config.outputFile
  };

  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid consolidator configuration', issues, overrides.configPath);
  }
  return config;
}

/**
 * Pair anchor phrases with their headings, in output column order
 */
export function buildAnchorSpec(config: ConsolidatorConfig): AnchorSpec[] {
  return config.anchorPhrases.map((phrase, index) => ({
    phrase,
    heading: config.columnHeadings[index] ?? phrase,
    column: index + 1
  }));
}
