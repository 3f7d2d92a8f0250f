import { Account, AccountCategory, StatementType } from '@variance-review/shared/types/statement.types';
import { DEFAULT_ACCOUNT_ENTRIES } from './default-accounts';

export interface CatalogEntry {
  code: string;
  name: string;
  category: AccountCategory;
  statementType: StatementType;
}

/**
 * Account Catalog
 * Static mapping from account code to category, resolved once at construction
 */
export class AccountCatalog {
  private readonly byCode = new Map<string, CatalogEntry>();
  private readonly byCategory = new Map<AccountCategory, string[]>();

  constructor(entries: CatalogEntry[] = DEFAULT_ACCOUNT_ENTRIES) {
    for (const entry of entries) {
      this.byCode.set(entry.code, entry);
      const codes = this.byCategory.get(entry.category) ?? [];
      codes.push(entry.code);
      this.byCategory.set(entry.category, codes);
    }
  }

  lookup(code: string): CatalogEntry | undefined {
    return this.byCode.get(code);
  }

  categoryOf(code: string): AccountCategory {
    return this.byCode.get(code)?.category ?? 'uncategorized';
  }

  codesFor(category: AccountCategory): string[] {
    return [...(this.byCategory.get(category) ?? [])];
  }

  /**
   * Build the immutable Account for a statement row.
   * Unknown codes resolve to the uncategorized tag.
   */
  resolveAccount(code: string, name: string, statementType: StatementType): Account {
    const entry = this.byCode.get(code);
    return Object.freeze({
      code,
      name: name.trim() || entry?.name || code,
      category: entry?.category ?? 'uncategorized',
      statementType,
    });
  }

  listEntries(): CatalogEntry[] {
    return [...this.byCode.values()].sort((a, b) => compareCodes(a.code, b.code));
  }
}

/**
 * Ordinal comparison of account codes, independent of the host locale
 */
export function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
