export type AnalysisErrorCode = 'configuration_error' | 'data_alignment_error' | 'statement_parse_error';

/**
 * Base class for failures that abort an analysis run before any result is produced
 */
export class AnalysisError extends Error {
  constructor(
    public readonly code: AnalysisErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

/**
 * Invalid thresholds, unknown categories or malformed rules
 */
export class ConfigurationError extends AnalysisError {
  constructor(
    message: string,
    public readonly problems: string[],
  ) {
    super('configuration_error', message, { problems });
    this.name = 'ConfigurationError';
  }
}

/**
 * Accounts whose period labels disagree with the rest of the snapshot
 */
export class DataAlignmentError extends AnalysisError {
  constructor(
    message: string,
    public readonly accountCodes: string[],
    details: Record<string, unknown> = {},
  ) {
    super('data_alignment_error', message, { ...details, accountCodes });
    this.name = 'DataAlignmentError';
  }
}
