import { parse } from 'csv-parse/sync';
import { AccountCatalog } from '@variance-review/analytics/catalog/account-catalog';
import {
  AccountSeries,
  PeriodOrder,
  StatementSnapshot,
  StatementType,
} from '@variance-review/shared/types/statement.types';
import { StatementParseError } from './statement-parse-error';

const CODE_HEADERS = ['account_code', 'account code', 'code', 'account'];
const NAME_HEADERS = ['account_name', 'account name', 'name', 'description'];
const MISSING_MARKERS = ['', '-', 'n/a', 'na'];

export interface ParsedStatement {
  periods: string[];
  accounts: AccountSeries[];
}

function toRows(records: unknown): string[][] {
  if (!Array.isArray(records)) {
    return [];
  }
  return records.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? '').trim()) : [],
  );
}

/**
 * CSV Statement Parser
 * One row per account, one column per period, as exported from a trial balance workbook
 */
export class StatementCsvParser {
  constructor(private readonly catalog: AccountCatalog = new AccountCatalog()) {}

  /**
   * Parse one statement; empty cells become explicit gaps
   */
  parseStatement(csvContent: string, statementType: StatementType): ParsedStatement {
    let records: unknown;
    try {
      records = parse(csvContent, {
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
        bom: true,
      });
    } catch (error) {
      throw new StatementParseError(
        `Could not read ${statementType} CSV: ${error instanceof Error ? error.message : String(error)}`,
        { statementType },
      );
    }

    const [header, ...rows] = toRows(records);
    if (!header) {
      throw new StatementParseError(`The ${statementType} CSV is empty`, { statementType });
    }

    const normalized = header.map((cell) => cell.toLowerCase());
    const codeColumn = normalized.findIndex((cell) => CODE_HEADERS.includes(cell));
    if (codeColumn === -1) {
      throw new StatementParseError(`The ${statementType} CSV has no account code column`, {
        statementType,
        header,
      });
    }
    const nameColumn = normalized.findIndex((cell) => NAME_HEADERS.includes(cell));

    const periodColumns = header
      .map((label, column) => ({ label, column }))
      .filter(({ label, column }) => column !== codeColumn && column !== nameColumn && label !== '');
    if (periodColumns.length === 0) {
      throw new StatementParseError(`The ${statementType} CSV has no period columns`, { statementType, header });
    }

    const accounts: AccountSeries[] = [];
    rows.forEach((row, index) => {
      const code = row[codeColumn] ?? '';
      if (code === '') {
        return;
      }
      const name = nameColumn === -1 ? '' : row[nameColumn] ?? '';

      accounts.push({
        account: this.catalog.resolveAccount(code, name, statementType),
        series: periodColumns.map(({ label, column }) => ({
          period: label,
          value: this.parseAmount(row[column] ?? '', { statementType, line: index + 2, period: label, code }),
        })),
      });
    });

    return { periods: periodColumns.map(({ label }) => label), accounts };
  }

  /**
   * Parse amount (handles thousands separators and bracketed negatives)
   */
  parseAmount(raw: string, context: Record<string, unknown> = {}): number | null {
    const trimmed = raw.trim();
    if (MISSING_MARKERS.includes(trimmed.toLowerCase())) {
      return null;
    }

    const bracketed = /^\((.*)\)$/.exec(trimmed);
    const cleaned = (bracketed ? bracketed[1] : trimmed).replace(/[,\s]/g, '');
    const value = Number(cleaned);
    if (cleaned === '' || !Number.isFinite(value)) {
      throw new StatementParseError(`Amount "${raw}" is not a number`, { ...context, value: raw });
    }

    return bracketed ? -Math.abs(value) : value;
  }
}

/**
 * Build the snapshot from the two statement exports.
 * The balance sheet header defines the period set; alignment is checked by the analyzer.
 */
export function buildSnapshotFromCsv(
  balanceSheetCsv: string,
  incomeStatementCsv: string,
  catalog: AccountCatalog = new AccountCatalog(),
  periodOrder: PeriodOrder = 'chronological',
): StatementSnapshot {
  const parser = new StatementCsvParser(catalog);
  const balanceSheet = parser.parseStatement(balanceSheetCsv, 'balance_sheet');
  const incomeStatement = parser.parseStatement(incomeStatementCsv, 'income_statement');

  return {
    periods: balanceSheet.periods,
    periodOrder,
    statements: {
      balance_sheet: balanceSheet.accounts,
      income_statement: incomeStatement.accounts,
    },
  };
}
