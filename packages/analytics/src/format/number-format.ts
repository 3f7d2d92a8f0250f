/**
 * Signed percentage with one decimal, e.g. +25.3% or -4.0%
 */
export function formatPercent(value: number): string {
  const rounded = value.toFixed(1);
  return value > 0 && rounded !== '0.0' ? `+${rounded}%` : `${rounded}%`;
}

/**
 * Amount with thousands separators and two decimals
 */
export function formatAmount(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatCategory(category: string): string {
  return category.replace(/_/g, ' ');
}
