import { CatalogEntry } from './account-catalog';

export const DEFAULT_ACCOUNT_ENTRIES: CatalogEntry[] = [
  // Balance sheet: assets
  { code: '217000001', name: 'Investment Properties: Land Use Rights', category: 'investment_properties', statementType: 'balance_sheet' },
  { code: '217000006', name: 'Investment Properties: Office Building', category: 'investment_properties', statementType: 'balance_sheet' },
  { code: '112227001', name: 'Current Account USD - Main', category: 'cash_deposits', statementType: 'balance_sheet' },
  { code: '112227002', name: 'Current Account USD - Secondary', category: 'cash_deposits', statementType: 'balance_sheet' },
  { code: '131100001', name: 'Trade Receivable: Tenant', category: 'trade_receivables', statementType: 'balance_sheet' },
  { code: '138900003', name: 'Unbilled Revenue Receivables', category: 'unbilled_revenue', statementType: 'balance_sheet' },
  { code: '133100001', name: 'VAT Deductible', category: 'vat_deductible', statementType: 'balance_sheet' },
  { code: '138820000', name: 'LT: Other Receivables: Related Parties', category: 'lending', statementType: 'balance_sheet' },
  { code: '138821001', name: 'LT: Other Receivables: Related Parties 2', category: 'lending', statementType: 'balance_sheet' },

  // Balance sheet: liabilities
  { code: '341160000', name: 'LT: Borrowings: Related Parties', category: 'borrowings', statementType: 'balance_sheet' },
  { code: '341160001', name: 'LT: Borrowings: Related Parties 2', category: 'borrowings', statementType: 'balance_sheet' },
  { code: '213100001', name: 'Unearned Revenue', category: 'unearned_revenue', statementType: 'balance_sheet' },

  // Income statement: revenue
  { code: '511100001', name: 'Rental Revenue', category: 'revenue', statementType: 'income_statement' },
  { code: '511100002', name: 'Service Revenue', category: 'revenue', statementType: 'income_statement' },
  { code: '515100001', name: 'Financial Income: Interest', category: 'interest_income', statementType: 'income_statement' },
  { code: '515600000', name: 'Financial Income: Shareholder Loan Interest', category: 'interest_income_shl', statementType: 'income_statement' },

  // Income statement: expenses
  { code: '632100001', name: 'Amortization Expense: Land Use Rights', category: 'depreciation', statementType: 'income_statement' },
  { code: '632100002', name: 'Depreciation Expense: Building', category: 'depreciation', statementType: 'income_statement' },
  { code: '635000005', name: 'Financial Expenses: Loan Interest - Related Parties', category: 'interest_expense', statementType: 'income_statement' },
  { code: '635000006', name: 'Financial Expenses: Loan Interest - Bank', category: 'interest_expense', statementType: 'income_statement' },
  { code: '622000001', name: 'Operating Expenses: Insurance', category: 'opex', statementType: 'income_statement' },
  { code: '622000002', name: 'Operating Expenses: Utilities', category: 'opex', statementType: 'income_statement' },
  { code: '622000003', name: 'Operating Expenses: Repairs & Maintenance', category: 'opex', statementType: 'income_statement' },
  { code: '641100001', name: 'FX Gain/Loss', category: 'fx_gain_loss', statementType: 'income_statement' },
];
