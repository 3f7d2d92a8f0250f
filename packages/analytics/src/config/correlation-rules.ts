import { CorrelationRule } from '@variance-review/shared/types/analysis-config.types';

/**
 * Built-in correlation rule catalog.
 * Rules are evaluated in id order; a new rule is a new record here or in configuration.
 */
export const DEFAULT_CORRELATION_RULES: CorrelationRule[] = [
  {
    id: 1,
    name: 'Investment Properties vs Depreciation',
    primaryCategory: 'investment_properties',
    correlatedCategory: 'depreciation',
    relationshipType: 'positive',
    enabled: true,
    description: 'Depreciation should follow changes in the investment property base',
  },
  {
    id: 2,
    name: 'Loan Balance vs Interest Expense',
    primaryCategory: 'borrowings',
    correlatedCategory: 'interest_expense',
    relationshipType: 'positive',
    enabled: true,
    description: 'A higher loan balance should lead to higher interest cost',
  },
  {
    id: 3,
    name: 'Cash Deposits vs Bank Interest Income',
    primaryCategory: 'cash_deposits',
    correlatedCategory: 'interest_income',
    relationshipType: 'positive',
    enabled: true,
    description: 'More cash on deposit should earn more interest income',
  },
  {
    id: 4,
    name: 'Quarterly Billing vs Trade Receivables',
    primaryCategory: 'revenue',
    correlatedCategory: 'trade_receivables',
    relationshipType: 'quarterly_timing',
    enabled: true,
    description: 'Receivables rise at the start of each quarter when tenants are billed',
    timing: { boundary: 'quarter_start', direction: 'increase' },
  },
  {
    id: 5,
    name: 'Revenue Straight-lining vs Unbilled Revenue',
    primaryCategory: 'revenue',
    correlatedCategory: 'unbilled_revenue',
    relationshipType: 'quarterly_timing',
    enabled: true,
    description: 'Unbilled revenue peaks at quarter end before billing',
    timing: { boundary: 'quarter_end', direction: 'increase' },
  },
  {
    id: 6,
    name: 'Advance Collection vs Unearned Revenue',
    primaryCategory: 'revenue',
    correlatedCategory: 'unearned_revenue',
    relationshipType: 'quarterly_timing',
    enabled: true,
    description: 'Unearned revenue rises at the start of the quarter from advance collection',
    timing: { boundary: 'quarter_start', direction: 'increase' },
  },
  {
    id: 7,
    name: 'Investment Properties vs VAT Deductible',
    primaryCategory: 'investment_properties',
    correlatedCategory: 'vat_deductible',
    relationshipType: 'positive',
    enabled: true,
    description: 'Capital expenditure increases deductible VAT',
  },
  {
    id: 8,
    name: 'Occupancy Rate vs Revenue',
    primaryCategory: 'occupancy_rate',
    correlatedCategory: 'revenue',
    relationshipType: 'positive',
    enabled: true,
    description: 'Higher occupancy should lead to more rental income',
  },
  {
    id: 9,
    name: 'Maintenance Expenses vs OPEX',
    primaryCategory: 'maintenance_expense',
    correlatedCategory: 'opex',
    relationshipType: 'positive',
    enabled: true,
    description: 'Maintenance spikes drive operating expenses up',
  },
  {
    id: 10,
    name: 'Asset Disposal vs Depreciation',
    primaryCategory: 'asset_disposal',
    correlatedCategory: 'depreciation',
    relationshipType: 'negative',
    enabled: true,
    description: 'Disposals should reduce the depreciation base',
  },
  {
    id: 11,
    name: 'New Lease Contracts vs Revenue',
    primaryCategory: 'new_leases',
    correlatedCategory: 'revenue',
    relationshipType: 'positive',
    enabled: true,
    description: 'New tenants should increase rental income',
  },
  {
    id: 12,
    name: 'Lease Termination vs Revenue',
    primaryCategory: 'lease_termination',
    correlatedCategory: 'revenue',
    relationshipType: 'negative',
    enabled: true,
    description: 'Terminations should reduce rental income',
  },
  {
    id: 13,
    name: 'FX Rate Volatility vs FX Gain/Loss',
    primaryCategory: 'fx_volatility',
    correlatedCategory: 'fx_gain_loss',
    relationshipType: 'conditional',
    enabled: true,
    description: 'Currency swings should show up in FX gains or losses',
  },
];
