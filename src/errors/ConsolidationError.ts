// src/errors/ConsolidationError.ts

export type ConsolidationErrorKind =
  | 'DirectoryUnreadable'
  | 'FileUnreadable'
  | 'FieldParseFailure'
  | 'OutputUnwritable'
  | 'ConfigurationInvalid';

/**
 * Fatal conditions. Any of these ends the run before an output file is
 * written (or while it is being written, for OutputUnwritable).
 */
export class ConsolidationError extends Error {
  readonly kind: ConsolidationErrorKind;
  readonly fileName?: string;

  constructor(kind: ConsolidationErrorKind, message: string, fileName?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConsolidationError';
    this.kind = kind;
    this.fileName = fileName;
  }
}

export class DirectoryUnreadableError extends ConsolidationError {
  constructor(dirPath: string, cause?: unknown) {
    super('DirectoryUnreadable', `Unable to read directory ${dirPath}`, dirPath, cause);
    this.name = 'DirectoryUnreadableError';
  }
}

export class FileUnreadableError extends ConsolidationError {
  constructor(fileName: string, cause?: unknown) {
    super('FileUnreadable', `Unable to open ${fileName}`, fileName, cause);
    this.name = 'FileUnreadableError';
  }
}

export class FieldParseFailureError extends ConsolidationError {
  readonly anchorPhrase: string;
  readonly rawValue: string;
  readonly lineNumber?: number;

  constructor(fileName: string, anchorPhrase: string, rawValue: string, detail: string, lineNumber?: number) {
    const where = lineNumber === undefined ? '' : ` (line ${lineNumber})`;
    super(
      'FieldParseFailure',
      `Invalid data for "${anchorPhrase}" in ${fileName}${where}: ${detail}. Report format may have changed.`,
      fileName
    );
    this.name = 'FieldParseFailureError';
    this.anchorPhrase = anchorPhrase;
    this.rawValue = rawValue;
    this.lineNumber = lineNumber;
  }
}

export class OutputUnwritableError extends ConsolidationError {
  constructor(outputFile: string, cause?: unknown) {
    super('OutputUnwritable', `Unable to open or create ${outputFile}`, outputFile, cause);
    this.name = 'OutputUnwritableError';
  }
}

export class ConfigurationError extends ConsolidationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], source?: string) {
    super('ConfigurationInvalid', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, source);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
