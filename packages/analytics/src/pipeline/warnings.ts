import { ComputationWarning } from '@variance-review/shared/types/warning.types';

/**
 * Merge warning lists from independent computations, keeping the first of each code and subject
 */
export function mergeWarnings(groups: ComputationWarning[][]): ComputationWarning[] {
  const merged = new Map<string, ComputationWarning>();
  for (const warning of groups.flat()) {
    const key = `${warning.code}|${warning.subject}`;
    if (!merged.has(key)) {
      merged.set(key, warning);
    }
  }
  return [...merged.values()];
}
