import { AnalysisError } from '@variance-review/analytics/errors/analysis-errors';

/**
 * Malformed statement input: missing columns or amounts that are not numbers
 */
export class StatementParseError extends AnalysisError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('statement_parse_error', message, details);
    this.name = 'StatementParseError';
  }
}
