import { AccountSeries, StatementSnapshot, STATEMENT_TYPES } from '@variance-review/shared/types/statement.types';
import { DataAlignmentError } from '../errors/analysis-errors';

export interface AlignedSnapshot {
  /** Oldest first */
  periods: string[];
  accounts: AccountSeries[];
}

function sameLabels(series: AccountSeries['series'], periods: string[]): boolean {
  return series.length === periods.length && series.every((point, index) => point.period === periods[index]);
}

/**
 * Verify every account reports exactly the snapshot's periods and normalize to chronological order.
 * Throws before any analysis happens so no partial result is ever produced.
 */
export function alignSnapshot(snapshot: StatementSnapshot): AlignedSnapshot {
  const periods = snapshot.periods;
  const duplicatePeriods = periods.filter((period, index) => periods.indexOf(period) !== index);
  if (duplicatePeriods.length > 0) {
    throw new DataAlignmentError(`Snapshot lists duplicate periods: ${duplicatePeriods.join(', ')}`, [], {
      duplicatePeriods,
    });
  }

  const accounts = STATEMENT_TYPES.flatMap((type) => snapshot.statements[type] ?? []);

  const seen = new Set<string>();
  const duplicateCodes: string[] = [];
  const misaligned: string[] = [];

  for (const { account, series } of accounts) {
    if (seen.has(account.code)) {
      duplicateCodes.push(account.code);
    }
    seen.add(account.code);

    if (!sameLabels(series, periods)) {
      misaligned.push(account.code);
    }
  }

  if (duplicateCodes.length > 0) {
    throw new DataAlignmentError(
      `Account codes appear more than once: ${duplicateCodes.join(', ')}`,
      duplicateCodes,
    );
  }

  if (misaligned.length > 0) {
    throw new DataAlignmentError(
      `Accounts do not match the snapshot periods [${periods.join(', ')}]: ${misaligned.join(', ')}`,
      misaligned,
      { expectedPeriods: periods },
    );
  }

  if (snapshot.periodOrder === 'newest_first') {
    return {
      periods: [...periods].reverse(),
      accounts: accounts.map(({ account, series }) => ({ account, series: [...series].reverse() })),
    };
  }

  return {
    periods: [...periods],
    accounts: accounts.map(({ account, series }) => ({ account, series: [...series] })),
  };
}
