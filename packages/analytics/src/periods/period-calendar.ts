import { QuarterPosition } from '@variance-review/shared/types/variance.types';

export interface CalendarMonth {
  year: number;
  month: number;
}

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const ISO_MONTH = /^(\d{4})[-/](\d{1,2})(?:[-/]\d{1,2})?$/;
const MONTH_FIRST = /^(\d{1,2})[-/](\d{4})$/;
const NAMED_MONTH = /^([a-z]{3,9})[\s_'.-]*(\d{2}|\d{4})$/i;

function normalizeYear(year: string): number {
  const value = Number(year);
  return year.length === 2 ? 2000 + value : value;
}

function validMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

/**
 * Parse a period label into a calendar month.
 * Accepts 2025-03, 2025-03-31, 03/2025, Mar_2025, Mar 2025, March-2025 and May'25.
 */
export function parsePeriodLabel(label: string): CalendarMonth | null {
  const text = label.trim();

  const iso = ISO_MONTH.exec(text);
  if (iso) {
    const month = Number(iso[2]);
    return validMonth(month) ? { year: Number(iso[1]), month } : null;
  }

  const monthFirst = MONTH_FIRST.exec(text);
  if (monthFirst) {
    const month = Number(monthFirst[1]);
    return validMonth(month) ? { year: Number(monthFirst[2]), month } : null;
  }

  const named = NAMED_MONTH.exec(text);
  if (named) {
    const month = MONTHS[named[1].slice(0, 3).toLowerCase()];
    return month ? { year: normalizeYear(named[2]), month } : null;
  }

  return null;
}

export function quarterPositionOf(month: number): QuarterPosition {
  const offset = (month - 1) % 3;
  if (offset === 0) return 'quarter_start';
  if (offset === 2) return 'quarter_end';
  return 'mid_quarter';
}

/**
 * Position of a period within its quarter, or null when the label carries no month
 */
export function quarterPosition(label: string): QuarterPosition | null {
  const parsed = parsePeriodLabel(label);
  return parsed ? quarterPositionOf(parsed.month) : null;
}
