import { AnalysisConfig, AnalysisConfigOverrides } from '@variance-review/shared/types/analysis-config.types';
import { AccountSeries, PeriodOrder, StatementSnapshot } from '@variance-review/shared/types/statement.types';
import { AccountCatalog } from '../src/catalog/account-catalog';
import { mergeAnalysisConfig } from '../src/config/config-validator';
import { DEFAULT_ANALYSIS_CONFIG } from '../src/config/default-config';

export interface AccountRow {
  code: string;
  name?: string;
  values: (number | null)[];
}

export const catalog = new AccountCatalog();

/**
 * Build a snapshot; statement type comes from the catalog, balance sheet for unknown codes
 */
export function buildSnapshot(
  periods: string[],
  rows: AccountRow[],
  periodOrder?: PeriodOrder,
  accountCatalog: AccountCatalog = catalog,
): StatementSnapshot {
  const statements: Record<'balance_sheet' | 'income_statement', AccountSeries[]> = {
    balance_sheet: [],
    income_statement: [],
  };

  for (const row of rows) {
    const statementType = accountCatalog.lookup(row.code)?.statementType ?? 'balance_sheet';
    statements[statementType].push({
      account: accountCatalog.resolveAccount(row.code, row.name ?? '', statementType),
      series: periods.map((period, index) => ({ period, value: row.values[index] ?? null })),
    });
  }

  return { periods, periodOrder, statements };
}

export function configWith(overrides: AnalysisConfigOverrides): AnalysisConfig {
  return mergeAnalysisConfig(DEFAULT_ANALYSIS_CONFIG, overrides);
}

/** Default thresholds with every correlation rule removed */
export const NO_RULES_CONFIG = configWith({ correlationRules: [] });

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
