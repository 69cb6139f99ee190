import type { PackageRecord } from "../types.js";

export const DEFAULT_SEARCH_CACHE_SIZE = 5;

export type Snapshot = readonly PackageRecord[];

export interface CatalogView {
  getInstalled(): Snapshot | undefined;
  getSearch(query: string): Snapshot | undefined;
  searchQueries(): string[];
}

/**
 * Last committed listing and the most recent search results. Every write
 * replaces a whole snapshot; nothing is persisted.
 */
export class PackageCatalog implements CatalogView {
  private installed: Snapshot | undefined;
  private readonly searches = new Map<string, Snapshot>();

  constructor(private readonly maxSearches = DEFAULT_SEARCH_CACHE_SIZE) {}

  getInstalled(): Snapshot | undefined {
    return this.installed;
  }

  setInstalled(records: readonly PackageRecord[]): Snapshot {
    const snapshot = Object.freeze([...records]);
    this.installed = snapshot;
    return snapshot;
  }

  invalidateInstalled(): void {
    this.installed = undefined;
  }

  getSearch(query: string): Snapshot | undefined {
    const key = searchKey(query);
    const snapshot = this.searches.get(key);
    if (!snapshot) {
      return undefined;
    }

    // Move to end for LRU ordering
    this.searches.delete(key);
    this.searches.set(key, snapshot);
    return snapshot;
  }

  setSearch(query: string, records: readonly PackageRecord[]): Snapshot {
    const key = searchKey(query);
    const snapshot = Object.freeze([...records]);
    this.searches.delete(key);
    this.searches.set(key, snapshot);

    while (this.searches.size > this.maxSearches) {
      const oldest = this.searches.keys().next();
      if (oldest.done) {
        break;
      }
      this.searches.delete(oldest.value);
    }

    return snapshot;
  }

  searchQueries(): string[] {
    return [...this.searches.keys()];
  }
}

export function searchKey(query: string): string {
  return query.trim().toLowerCase();
}
