// src/services/ReportPurger.ts
import * as fs from 'fs-extra';
import inquirer from 'inquirer';
import { Logger } from '../utils/logger';

/**
 * Post-run cleanup of consumed reports. Only called after the CSV has been
 * written, never from inside extraction.
 */
export interface ReportPurger {
  confirmAndPurge(promptText: string, files: string[]): Promise<boolean>;
}

export type AskFunction = (question: string) => Promise<string>;

const POSITIVE_ANSWERS = ['y', 'yes'];
const NEGATIVE_ANSWERS = ['n', 'no'];

/**
 * true for y/yes, false for n/no (any case), null for anything else
 */
export function parseYesNo(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (POSITIVE_ANSWERS.includes(normalized)) return true;
  if (NEGATIVE_ANSWERS.includes(normalized)) return false;
  return null;
}

export const askWithInquirer: AskFunction = async (question: string): Promise<string> => {
  const answers = await inquirer.prompt<{ answer: string }>([
    {
      type: 'input',
      name: 'answer',
      message: question
    }
  ]);
  return answers.answer;
};

export class InteractiveReportPurger implements ReportPurger {
  private readonly logger = new Logger('ReportPurger');

  constructor(private readonly ask: AskFunction = askWithInquirer) {}

  async confirmAndPurge(promptText: string, files: string[]): Promise<boolean> {
    let choice = parseYesNo(await this.ask(promptText));
    while (choice === null) {
      this.logger.warn('Please answer y, yes, n or no.');
      choice = parseYesNo(await this.ask(promptText));
    }

    if (!choice) {
      return false;
    }

    for (const file of files) {
      await fs.remove(file);
      this.logger.debug(`Removed ${file}`);
    }
    this.logger.info(`Removed ${files.length} report file(s)`);
    return true;
  }
}

/**
 * Skips the prompt: --force purges, --keep-reports keeps
 */
export class FixedAnswerReportPurger implements ReportPurger {
  private readonly delegate: InteractiveReportPurger;

  constructor(purge: boolean) {
    this.delegate = new InteractiveReportPurger(async () => (purge ? 'y' : 'n'));
  }

  confirmAndPurge(promptText: string, files: string[]): Promise<boolean> {
    return this.delegate.confirmAndPurge(promptText, files);
  }
}
