import type { ResultStore } from '../pipeline/result-store.js';
import { houseNumberQueryKey, streetQueryKey } from '../pipeline/query-keys.js';
import type { SuggestQuery } from '../suggest/types.js';
import { AlphabetPruner } from './alphabet-pruner.js';
import { digitSymbols } from './alphabets.js';
import type { ExplorationScope } from './types.js';

/** The global street-name search; discoveries go straight into the store. */
export class StreetScope implements ExplorationScope {
  readonly label = 'street';
  private readonly store: ResultStore;
  private readonly pruner: AlphabetPruner;

  constructor(store: ResultStore, pruner: AlphabetPruner = new AlphabetPruner()) {
    this.store = store;
    this.pruner = pruner;
  }

  get discoveredCount(): number {
    return this.store.streetCount;
  }

  toQuery(prefix: string): SuggestQuery {
    return { kind: 'street', prefix };
  }

  nextSymbols(prefix: string): readonly string[] {
    return this.pruner.nextSymbols(prefix);
  }

  merge(values: readonly string[]): number {
    return this.store.mergeStreets(values);
  }

  isCompleted(prefix: string): boolean {
    return this.store.isQueryCompleted(streetQueryKey(prefix));
  }

  markCompleted(prefix: string): void {
    this.store.markQueryCompleted(streetQueryKey(prefix));
  }

  markFailed(prefix: string): void {
    this.store.markQueryFailed(streetQueryKey(prefix));
  }

  clearFailed(prefix: string): void {
    this.store.clearQueryFailed(streetQueryKey(prefix));
  }
}

/**
 * House-number search under one street. Numbers are buffered here and only
 * reach the store through `commit()`, which also marks the street processed.
 */
export class HouseNumberScope implements ExplorationScope {
  readonly label: string;
  readonly street: string;
  private readonly store: ResultStore;
  private readonly found: Set<string>;

  constructor(store: ResultStore, street: string) {
    this.store = store;
    this.street = street;
    this.label = `house-number (${street})`;
    this.found = new Set();
  }

  get discoveredCount(): number {
    return this.found.size;
  }

  toQuery(prefix: string): SuggestQuery {
    return { kind: 'house-number', street: this.street, prefix };
  }

  nextSymbols(): readonly string[] {
    return digitSymbols();
  }

  merge(values: readonly string[]): number {
    let added = 0;

    for (const value of values) {
      if (!this.found.has(value)) {
        this.found.add(value);
        added += 1;
      }
    }

    return added;
  }

  isCompleted(prefix: string): boolean {
    return this.store.isQueryCompleted(houseNumberQueryKey(this.street, prefix));
  }

  markCompleted(prefix: string): void {
    this.store.markQueryCompleted(houseNumberQueryKey(this.street, prefix));
  }

  markFailed(prefix: string): void {
    this.store.markQueryFailed(houseNumberQueryKey(this.street, prefix));
  }

  clearFailed(prefix: string): void {
    this.store.clearQueryFailed(houseNumberQueryKey(this.street, prefix));
  }

  commit(): number {
    return this.store.mergeHouseNumbers(this.street, this.found);
  }
}
