import FlexSearch from 'flexsearch';
import type { EnrichedDocumentSearchResultSetUnit } from 'flexsearch';
import type { IndexItem } from './types';

type ItemDocument = {
  key: number;
  searchText: string;
};

const DEFAULT_LIMIT = 50;

function createDocumentIndex() {
  return new FlexSearch.Document<ItemDocument, true>({
    tokenize: 'forward',
    cache: 100,
    document: {
      id: 'key',
      store: true,
      index: [{ field: 'searchText', tokenize: 'forward' }],
    },
  });
}

type Snapshot = {
  readonly items: readonly IndexItem[];
  readonly index: ReturnType<typeof createDocumentIndex>;
};

const createSnapshot = (items: readonly IndexItem[]): Snapshot => {
  const frozen = Object.freeze([...items]);
  const index = createDocumentIndex();
  frozen.forEach((item, key) => {
    index.add({ key, searchText: item.searchText });
  });
  return { items: frozen, index };
};

/**
 * The host-side item index. Each publish builds a complete new snapshot and swaps it in with a
 * single assignment, so a query sees either the old collection or the new one.
 */
export class SearchIndex {
  private snapshot: Snapshot = createSnapshot([]);

  get size(): number {
    return this.snapshot.items.length;
  }

  get items(): readonly IndexItem[] {
    return this.snapshot.items;
  }

  setItems(items: readonly IndexItem[]): void {
    this.snapshot = createSnapshot(items);
  }

  query(rawQuery: string, limit: number = DEFAULT_LIMIT): IndexItem[] {
    const { items, index } = this.snapshot;
    const queryText = rawQuery.trim().toLowerCase();

    if (!queryText) {
      return items.slice(0, limit);
    }

    const rawResults = index.search<true>(queryText, undefined, {
      enrich: true,
      limit,
    }) as EnrichedDocumentSearchResultSetUnit<ItemDocument>[];

    const seen = new Set<number>();
    const hits: IndexItem[] = [];
    for (const fieldResult of rawResults) {
      for (const entry of fieldResult.result) {
        const key = Number(entry.id);
        const item = items[key];
        if (!item || seen.has(key)) {
          continue;
        }
        seen.add(key);
        hits.push(item);
        if (hits.length >= limit) {
          return hits;
        }
      }
    }
    return hits;
  }
}
