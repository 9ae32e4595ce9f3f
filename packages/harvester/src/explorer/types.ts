import type { SuggestQuery } from '../suggest/types.js';

/**
 * One namespace of the search: the global street search, or the
 * house-number search under a single street. Owns the discovered values
 * and the completed/failed prefix bookkeeping for that namespace.
 */
interface ExplorationScope {
  readonly label: string;
  readonly discoveredCount: number;
  toQuery(prefix: string): SuggestQuery;
  nextSymbols(prefix: string): readonly string[];
  /** Adds values and returns how many were new. */
  merge(values: readonly string[]): number;
  isCompleted(prefix: string): boolean;
  markCompleted(prefix: string): void;
  markFailed(prefix: string): void;
  clearFailed(prefix: string): void;
}

type ExploreOutcome = {
  queries: number;
  completed: number;
  expanded: number;
  failed: number;
  discovered: number;
};

type PrefixExplorerConfig = {
  truncationThreshold: number;
};

export type { ExplorationScope, ExploreOutcome, PrefixExplorerConfig };
