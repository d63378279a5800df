import Fuse from 'fuse.js';
import filterTable from '../../data/filters.json';
import { ValidationError } from '../utils/errors';

export interface FilterTable {
  /** Canonical (native script) key to English alias */
  categories: Record<string, string>;
  versions: Record<string, string>;
}

export interface ResolvedFilters {
  categories: string[];
  versions: string[];
}

export interface FilterEntry {
  key: string;
  alias: string;
}

const splitTokens = (input: string | null | undefined): string[] =>
  (input ?? '')
    .split(',')
    .map(token => token.trim())
    .filter(token => token.length > 0);

/** Lowercased alias and lowercased key both point at the canonical key. */
const buildLookup = (entries: Record<string, string>): Map<string, string> => {
  const lookup = new Map<string, string>();
  for (const [key, alias] of Object.entries(entries)) {
    lookup.set(alias.toLowerCase(), key);
  }
  for (const key of Object.keys(entries)) {
    lookup.set(key.toLowerCase(), key);
  }
  return lookup;
};

export class FilterResolver {
  private readonly categoryLookup: Map<string, string>;
  private readonly versionLookup: Map<string, string>;
  private readonly categorySearch: Fuse<FilterEntry>;

  constructor(private readonly table: FilterTable = filterTable) {
    this.categoryLookup = buildLookup(table.categories);
    this.versionLookup = buildLookup(table.versions);
    this.categorySearch = new Fuse(this.categoryEntries(), {
      keys: ['key', 'alias'],
      includeScore: true,
      threshold: 0.4
    });
  }

  categoryEntries(): FilterEntry[] {
    return Object.entries(this.table.categories).map(([key, alias]) => ({ key, alias }));
  }

  versionEntries(): FilterEntry[] {
    return Object.entries(this.table.versions).map(([key, alias]) => ({ key, alias }));
  }

  /**
   * Maps comma-separated category tokens to canonical keys. Any unknown
   * token rejects the whole set.
   */
  resolveCategories(input: string | null | undefined): string[] {
    const resolved: string[] = [];
    const invalid: string[] = [];

    for (const token of splitTokens(input)) {
      const key = this.categoryLookup.get(token.toLowerCase());
      if (key) {
        if (!resolved.includes(key)) resolved.push(key);
      } else {
        invalid.push(token);
      }
    }

    if (invalid.length > 0) {
      const hints = invalid
        .map(token => {
          const suggestion = this.suggestCategory(token);
          return suggestion ? `${token} (did you mean ${suggestion.alias}?)` : token;
        })
        .join(', ');
      const valid = this.categoryEntries().map(entry => `${entry.key} (${entry.alias})`).join(', ');
      throw new ValidationError(`Invalid categories: ${hints}. Valid categories: ${valid}`, invalid);
    }

    return resolved;
  }

  /** Unknown version tokens are kept as literal filter values. */
  resolveVersions(input: string | null | undefined): string[] {
    const resolved: string[] = [];
    for (const token of splitTokens(input)) {
      const value = this.versionLookup.get(token.toLowerCase()) ?? token;
      if (!resolved.includes(value)) resolved.push(value);
    }
    return resolved;
  }

  resolve(categories: string | null | undefined, versions: string | null | undefined): ResolvedFilters {
    return {
      categories: this.resolveCategories(categories),
      versions: this.resolveVersions(versions)
    };
  }

  suggestCategory(token: string): FilterEntry | null {
    const [best] = this.categorySearch.search(token);
    return best ? best.item : null;
  }
}
