#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import * as dotenv from 'dotenv';
import { ConsolidatorConfig, LogLevel } from '../types/config.types';
import { loadConsolidatorConfig } from '../config/config-loader';
import { logLevelSchema } from '../config/config-schema';
import { ConsolidationError } from '../errors/ConsolidationError';
import { ReportConsolidator, ConsolidationResult } from '../services/ReportConsolidator';
import { DirectoryReportSource } from '../services/ReportSource';
import { CsvReportWriter } from '../services/CsvReportWriter';
import { FixedAnswerReportPurger, InteractiveReportPurger, ReportPurger } from '../services/ReportPurger';
import { Logger, getLogFilePaths } from '../utils/logger';
import { initializeLogger } from '../utils/log-config-loader';
import { truncateFileName } from '../utils/display';

dotenv.config();

export interface ConsolidateOptions {
  input?: string;
  output?: string;
  config?: string;
  force?: boolean;
  keepReports?: boolean;
  logLevel?: LogLevel;
}

export interface ConsolidateRun {
  result: ConsolidationResult;
  written: boolean;
  purged: boolean;
}

const logger = new Logger('consolidate');
const program = new Command();

program
  .name('consolidate')
  .description('Combine read cycle exception reports into one CSV, by billing month and cycle')
  .version('1.0.0')
  .option('-i, --input <dir>', 'Folder the reports are dropped into (default: reports)')
  .option('-o, --output <file>', 'CSV file to write (default: output.csv)')
  .option('-c, --config <file>', 'JSON file overriding anchors, headings, offsets or cycle count')
  .addOption(new Option('-f, --force', 'Delete the consumed reports without asking').conflicts('keepReports'))
  .option('-k, --keep-reports', 'Keep the consumed reports without asking')
  .addOption(new Option('--log-level <level>', 'Console log level').choices(['error', 'warn', 'info', 'debug']))
  .action(async (options: ConsolidateOptions) => {
    try {
      initializeLogger();
      const level = resolveConsoleLogLevel(options.logLevel, process.env);
      if (level) {
        logger.setLevel(level);
      }
      await consolidate(options, selectPurger(options));
    } catch (error) {
      reportFatal(error);
      process.exit(1);
    }
  });

/**
 * --log-level wins over LOG_LEVEL. Either one overrides the level of the
 * logging profile, which is applied by initializeLogger.
 */
export function resolveConsoleLogLevel(optionLevel: LogLevel | undefined, env: NodeJS.ProcessEnv): LogLevel | undefined {
  if (optionLevel) return optionLevel;
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : undefined;
}

/**
 * One full run. The CSV is written only after every report consolidated, and
 * the purger is asked only once the CSV is on disk.
 */
export async function consolidate(options: ConsolidateOptions, purger: ReportPurger): Promise<ConsolidateRun> {
  const config = loadConsolidatorConfig({
    configPath: options.config,
    reportsDir: options.input,
    outputFile: options.output
  });

  logger.info('=== Read Cycle Report Consolidation ===');
  logger.info(`Reports folder: ${config.reportsDir}`);
  logger.info(`Output file: ${config.outputFile}`);
  logger.debug(`Anchors: ${config.anchorPhrases.length}, cycles per billing month: ${config.cyclesPerBillingMonth}`);

  const consolidator = new ReportConsolidator(config, new DirectoryReportSource(config.reportsDir, config.encoding));
  const result = await consolidator.consolidate();

  if (result.filesFound === 0) {
    logger.info('No reports found. Exiting.');
    return { result, written: false, purged: false };
  }

  await new CsvReportWriter(config.outputFile).writeRows(result.rows);
  printSummary(result, config);

  const consumed = result.outcomes.map(outcome => outcome.fileName);
  const purged = await purger.confirmAndPurge(`Would you like to empty the ${config.reportsDir} folder? [Y/N]`, consumed);

  console.log(purged
    ? chalk.green(`\n✓ ${config.reportsDir} folder cleared out successfully.`)
    : chalk.yellow(`\n${config.reportsDir} folder not emptied.`));
  console.log(chalk.green('\nAll done!\n'));

  return { result, written: true, purged };
}

export function selectPurger(options: ConsolidateOptions): ReportPurger {
  if (options.force) return new FixedAnswerReportPurger(true);
  if (options.keepReports) return new FixedAnswerReportPurger(false);
  return new InteractiveReportPurger();
}

function printSummary(result: ConsolidationResult, config: ConsolidatorConfig): void {
  const merged = result.outcomes.filter(outcome => outcome.status === 'merged');
  const skipped = result.outcomes.filter(outcome => outcome.status === 'skipped');

  console.log(chalk.cyan('\n════════════════════════════════════════'));
  console.log(chalk.cyan('  Consolidation Summary'));
  console.log(chalk.cyan('════════════════════════════════════════'));
  console.log(chalk.white(`  Reports found:   ${result.filesFound}`));
  console.log(chalk.white(`  Merged:          ${merged.length}`));
  console.log(chalk.white(`  Skipped:         ${skipped.length}`));
  console.log(chalk.white(`  Billing months:  ${result.matrix.monthsWithData().length}`));
  console.log(chalk.white(`  Warnings:        ${result.warnings.length}`));

  if (skipped.length > 0) {
    console.log(chalk.cyan('\n  Skipped (no schedule data):'));
    for (const outcome of skipped) {
      console.log(chalk.yellow(`    ${truncateFileName(outcome.fileName)}`));
    }
  }

  const flagged = result.warnings.filter(warning => warning.kind !== 'ScheduleDateMissing' && warning.kind !== 'ReadCycleMissing');
  if (flagged.length > 0) {
    console.log(chalk.cyan('\n  Needs review:'));
    for (const warning of flagged) {
      console.log(chalk.yellow(`    ${warning.kind.padEnd(24)} ${truncateFileName(warning.fileName)}`));
    }
  }

  console.log(chalk.green(`\n✓ ${config.outputFile} created successfully. Check it for accuracy before clearing the reports.`));
}

function reportFatal(error: unknown): void {
  if (error instanceof ConsolidationError) {
    logger.error(`${error.kind}: ${error.message}`, error.cause);
    console.error(chalk.red(`\n✗ ${error.message} Exiting.`));
  } else {
    logger.error('Consolidation failed', error instanceof Error ? error.stack : error);
  }

  const logFiles = getLogFilePaths();
  if (logFiles) {
    console.error(chalk.gray(`  Details: ${logFiles.error}`));
  }
}

if (require.main === module) {
  program.parseAsync(process.argv).catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
