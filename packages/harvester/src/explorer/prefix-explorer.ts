import { createLogger } from '@workspace/logger';
import type { HarvestMetrics } from '../observability/metrics.js';
import type { SuggestFn } from '../suggest/types.js';
import type {
  ExplorationScope,
  ExploreOutcome,
  PrefixExplorerConfig,
} from './types.js';

const log = createLogger('Explorer');

const DEFAULT_CONFIG: PrefixExplorerConfig = {
  truncationThreshold: 12,
};

function emptyOutcome(): ExploreOutcome {
  return { queries: 0, completed: 0, expanded: 0, failed: 0, discovered: 0 };
}

function addOutcome(total: ExploreOutcome, outcome: ExploreOutcome): void {
  total.queries += outcome.queries;
  total.completed += outcome.completed;
  total.expanded += outcome.expanded;
  total.failed += outcome.failed;
  total.discovered += outcome.discovered;
}

/**
 * Walks the prefix tree behind a truncating autocomplete service.
 *
 * A prefix whose answer is shorter than the truncation threshold has been
 * seen in full and is marked completed. A full page means more values may
 * hide behind it, so every child prefix from the scope's alphabet is
 * queried, depth first. Failed queries are recorded on the scope and never
 * count as completed.
 */
export class PrefixExplorer {
  private readonly suggest: SuggestFn;
  private readonly config: PrefixExplorerConfig;
  private readonly metrics: HarvestMetrics | undefined;

  constructor(
    suggest: SuggestFn,
    config?: Partial<PrefixExplorerConfig>,
    metrics?: HarvestMetrics,
  ) {
    this.suggest = suggest;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = metrics;
  }

  async explore(
    scope: ExplorationScope,
    prefix: string,
  ): Promise<ExploreOutcome> {
    const outcome = emptyOutcome();
    const stack: string[] = [prefix];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) {
        break;
      }

      if (scope.isCompleted(current)) {
        continue;
      }

      log.debug(`Exploring ${scope.label} prefix: ${current}`);

      const startTime = performance.now();
      const result = await this.suggest(scope.toQuery(current));
      this.metrics?.recordDuration(performance.now() - startTime);
      this.metrics?.increment('queries.total');
      outcome.queries += 1;

      if (!result.success) {
        scope.markFailed(current);
        this.metrics?.increment('queries.failed');
        outcome.failed += 1;
        log.warn(
          `Query failed for ${scope.label} prefix '${current}' (${result.errorCode}): ${result.error}`,
        );
        continue;
      }

      scope.clearFailed(current);
      outcome.discovered += scope.merge(result.suggestions);

      if (result.suggestions.length === this.config.truncationThreshold) {
        // Reverse push so children pop in alphabet order
        const symbols = [...scope.nextSymbols(current)].reverse();
        for (const symbol of symbols) {
          stack.push(current + symbol);
        }
        this.metrics?.increment('prefixes.expanded');
        outcome.expanded += 1;
        continue;
      }

      scope.markCompleted(current);
      this.metrics?.increment('prefixes.completed');
      outcome.completed += 1;
    }

    return outcome;
  }

  async exploreAll(
    scope: ExplorationScope,
    prefixes: Iterable<string>,
  ): Promise<ExploreOutcome> {
    const total = emptyOutcome();

    for (const prefix of prefixes) {
      addOutcome(total, await this.explore(scope, prefix));
    }

    return total;
  }
}
