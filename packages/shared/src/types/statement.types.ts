export type StatementType = 'balance_sheet' | 'income_statement';

export const STATEMENT_TYPES: readonly StatementType[] = ['balance_sheet', 'income_statement'];

export const ACCOUNT_CATEGORIES = [
  'investment_properties',
  'cash_deposits',
  'trade_receivables',
  'unbilled_revenue',
  'vat_deductible',
  'lending',
  'borrowings',
  'unearned_revenue',
  'revenue',
  'interest_income',
  'interest_income_shl',
  'depreciation',
  'interest_expense',
  'opex',
  'fx_gain_loss',
  'occupancy_rate',
  'maintenance_expense',
  'asset_disposal',
  'new_leases',
  'lease_termination',
  'fx_volatility',
  'uncategorized',
] as const;

export type AccountCategory = (typeof ACCOUNT_CATEGORIES)[number];

export interface Account {
  readonly code: string;
  readonly name: string;
  readonly category: AccountCategory;
  readonly statementType: StatementType;
}

/**
 * A null value marks a period the statement reported without an amount.
 */
export interface PeriodValue {
  period: string;
  value: number | null;
}

export type PeriodSeries = PeriodValue[];

export interface AccountSeries {
  account: Account;
  series: PeriodSeries;
}

export type PeriodOrder = 'chronological' | 'newest_first';

export interface StatementSnapshot {
  periods: string[];
  periodOrder?: PeriodOrder;
  statements: Record<StatementType, AccountSeries[]>;
}
