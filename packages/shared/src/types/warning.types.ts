export type ComputationWarningCode =
  | 'empty_category'
  | 'period_gap'
  | 'insufficient_history'
  | 'period_label_unparsed';

/**
 * Non-fatal finding surfaced next to the summary
 */
export interface ComputationWarning {
  code: ComputationWarningCode;
  message: string;
  subject: string;
}
