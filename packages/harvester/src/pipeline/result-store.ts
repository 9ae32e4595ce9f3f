import { compareStrings, sortHouseNumbers } from './natural-sort.js';
import { parseQueryKey } from './query-keys.js';
import type { HarvestSnapshot, HarvestStats, RepairPlan } from './types.js';

/**
 * Everything one harvest has found so far. Merges are set unions, so
 * replaying the same results never changes the store; nothing is ever
 * removed except a failure record that a later query has cleared.
 */
export class ResultStore {
  private readonly streetNames: Set<string>;
  private readonly streetNumbers: Map<string, Set<string>>;
  private readonly completedQueries: Set<string>;
  private readonly failedQueries: Set<string>;

  constructor() {
    this.streetNames = new Set();
    this.streetNumbers = new Map();
    this.completedQueries = new Set();
    this.failedQueries = new Set();
  }

  mergeStreets(names: Iterable<string>): number {
    let added = 0;

    for (const name of names) {
      if (!this.streetNames.has(name)) {
        this.streetNames.add(name);
        added += 1;
      }
    }

    return added;
  }

  /** Records the street as processed, even when `numbers` is empty. */
  mergeHouseNumbers(street: string, numbers: Iterable<string>): number {
    let existing = this.streetNumbers.get(street);
    if (!existing) {
      existing = new Set();
      this.streetNumbers.set(street, existing);
    }

    let added = 0;
    for (const number of numbers) {
      if (!existing.has(number)) {
        existing.add(number);
        added += 1;
      }
    }

    return added;
  }

  isStreetProcessed(street: string): boolean {
    return this.streetNumbers.has(street);
  }

  isQueryCompleted(key: string): boolean {
    return this.completedQueries.has(key);
  }

  markQueryCompleted(key: string): void {
    this.completedQueries.add(key);
  }

  isQueryFailed(key: string): boolean {
    return this.failedQueries.has(key);
  }

  markQueryFailed(key: string): void {
    this.failedQueries.add(key);
  }

  clearQueryFailed(key: string): void {
    this.failedQueries.delete(key);
  }

  /** Failed queries of earlier runs, grouped by the scope they belong to. */
  repairPlan(): RepairPlan {
    const plan: RepairPlan = {
      streetPrefixes: [],
      houseNumberPrefixes: new Map(),
    };

    for (const key of [...this.failedQueries].sort(compareStrings)) {
      const parsed = parseQueryKey(key);

      if (parsed.kind === 'street') {
        plan.streetPrefixes.push(parsed.prefix);
        continue;
      }

      const prefixes = plan.houseNumberPrefixes.get(parsed.street) ?? [];
      prefixes.push(parsed.prefix);
      plan.houseNumberPrefixes.set(parsed.street, prefixes);
    }

    return plan;
  }

  sortedStreets(): string[] {
    return [...this.streetNames].sort(compareStrings);
  }

  houseNumbersOf(street: string): string[] {
    return sortHouseNumbers(this.streetNumbers.get(street) ?? []);
  }

  get streetCount(): number {
    return this.streetNames.size;
  }

  stats(): HarvestStats {
    let houseNumbers = 0;
    for (const numbers of this.streetNumbers.values()) {
      houseNumbers += numbers.size;
    }

    return {
      streets: this.streetNames.size,
      completedQueries: this.completedQueries.size,
      failedQueries: this.failedQueries.size,
      processedStreets: this.streetNumbers.size,
      houseNumbers,
    };
  }

  snapshot(): HarvestSnapshot {
    const streetNumbers: Record<string, string[]> = {};
    for (const street of [...this.streetNumbers.keys()].sort(compareStrings)) {
      streetNumbers[street] = this.houseNumbersOf(street);
    }

    return {
      streetNames: this.sortedStreets(),
      completedQueries: [...this.completedQueries].sort(compareStrings),
      failedQueries: [...this.failedQueries].sort(compareStrings),
      streetNumbers,
    };
  }

  restore(snapshot: HarvestSnapshot): void {
    this.mergeStreets(snapshot.streetNames);

    for (const key of snapshot.completedQueries) {
      this.completedQueries.add(key);
    }

    for (const key of snapshot.failedQueries) {
      this.failedQueries.add(key);
    }

    for (const [street, numbers] of Object.entries(snapshot.streetNumbers)) {
      this.mergeHouseNumbers(street, numbers);
    }
  }
}
